import { describe, it, expect, beforeEach } from "@jest/globals";
import { LookupScriptureUseCase } from "../LookupScriptureUseCase";
import { LookupScriptureDto } from "../../dto/LookupScriptureDto";
import { ScriptureProviderRegistry } from "../../../../domain/scripture/services/ScriptureProviderRegistry";
import { DEFAULT_LOOKUP_OPTIONS } from "../../../../domain/scripture/value-objects/LookupOptions";
import { MockLogger } from "../../../../infrastructure/logging/__tests__/MockLogger";
import {
  ReferenceParseError,
  UnsupportedVersionError,
} from "../../../../shared/errors/ScriptureError";
import { FakeScriptureProvider } from "../../../../__tests__/helpers/fakes";

describe("LookupScriptureUseCase", () => {
  let esv: FakeScriptureProvider;
  let useCase: LookupScriptureUseCase;

  beforeEach(() => {
    esv = new FakeScriptureProvider("ESV", {
      "Romans 8:1-4": { canonical: "Romans 8:1–4", text: "[1] There is therefore now no condemnation." },
    });
    useCase = new LookupScriptureUseCase(new ScriptureProviderRegistry([esv]), new MockLogger());
  });

  it("should fetch the normalized reference and return the raw text", async () => {
    const dto = new LookupScriptureDto("rom 8:1-4", "ESV", DEFAULT_LOOKUP_OPTIONS);

    const result = await useCase.execute(dto);

    expect(result).toEqual({
      reference: "Romans 8:1-4",
      canonical: "Romans 8:1–4",
      text: "[1] There is therefore now no condemnation.",
      version: "ESV",
      translation: "Fake ESV",
    });
    expect(esv.calls).toEqual([{ reference: "Romans 8:1-4", options: DEFAULT_LOOKUP_OPTIONS }]);
  });

  it("should reject a reference it cannot parse", async () => {
    const dto = new LookupScriptureDto("not a reference", "ESV", DEFAULT_LOOKUP_OPTIONS);

    await expect(useCase.execute(dto)).rejects.toBeInstanceOf(ReferenceParseError);
    expect(esv.calls).toHaveLength(0);
  });

  it("should reject a version without a provider", async () => {
    const dto = new LookupScriptureDto("Romans 8:1", "NET", DEFAULT_LOOKUP_OPTIONS);

    await expect(useCase.execute(dto)).rejects.toBeInstanceOf(UnsupportedVersionError);
  });
});
