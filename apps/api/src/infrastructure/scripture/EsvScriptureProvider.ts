import { inject, injectable } from "tsyringe";
import { z } from "zod";
import { TYPES } from "../../di/types";
import { IScriptureProvider } from "../../domain/scripture/ports/IScriptureProvider";
import { LookupResult } from "../../domain/scripture/types";
import { LookupOptions } from "../../domain/scripture/value-objects/LookupOptions";
import { ScriptureReference } from "../../domain/scripture/value-objects/ScriptureReference";
import { ScriptureVersion } from "../../domain/scripture/value-objects/ScriptureVersion";
import { IConfig } from "../../shared/config/IConfig";
import {
  ProviderConfigError,
  ProviderNetworkError,
  ProviderNotFoundError,
  ProviderRateLimitError,
  ProviderUpstreamError,
} from "../../shared/errors/ScriptureError";
import { ILogger } from "../logging/ILogger";
import {
  httpGet,
  HttpResponse,
  parseJson,
  TransportError,
} from "../http/httpClient";

const PROVIDER = "ESV API";

const esvResponseSchema = z.object({
  canonical: z.string().optional(),
  passages: z.array(z.string()).default([]),
});

function flag(value: boolean): string {
  return value ? "true" : "false";
}

/**
 * English Standard Version adapter (api.esv.org passage text endpoint).
 *
 * Returns plain text with bracketed verse markers. Passage references are
 * not requested; the canonical reference comes back in its own field.
 */
@injectable()
export class EsvScriptureProvider implements IScriptureProvider {
  readonly version: ScriptureVersion = "ESV";
  readonly name = "English Standard Version";

  private readonly logger: ILogger;

  constructor(
    @inject(TYPES.Config) private readonly config: IConfig,
    @inject(TYPES.Logger) logger: ILogger,
  ) {
    this.logger = logger.child({ provider: "esv" });
  }

  async fetch(
    reference: ScriptureReference,
    options: LookupOptions,
  ): Promise<LookupResult> {
    const apiKey = this.config.esvApiKey;
    if (!apiKey) {
      throw new ProviderConfigError(
        PROVIDER,
        "ESV API key is not configured. Set ESV_API_KEY.",
      );
    }

    const url = new URL(this.config.esvApiUrl);
    url.searchParams.set("q", reference.toString());
    url.searchParams.set("include-passage-references", "false");
    url.searchParams.set("include-verse-numbers", flag(options.includeVerseNumbers));
    url.searchParams.set("include-first-verse-numbers", flag(options.includeVerseNumbers));
    url.searchParams.set("include-footnotes", flag(options.includeFootnotes));
    url.searchParams.set("include-footnote-body", flag(options.includeFootnotes));
    url.searchParams.set("include-headings", flag(options.includeHeadings));
    url.searchParams.set("include-short-copyright", flag(options.includeShortCopyright));

    let response: HttpResponse;
    try {
      response = await httpGet(url.toString(), {
        headers: {
          Authorization: apiKey.startsWith("Token ") ? apiKey : `Token ${apiKey}`,
        },
        timeoutMs: this.config.providerTimeoutMs,
      });
    } catch (error) {
      if (error instanceof TransportError) {
        this.logger.error("Error connecting to ESV API", error, {
          reference: reference.toString(),
          timedOut: error.timedOut,
        });
        throw new ProviderNetworkError(
          PROVIDER,
          error.timedOut,
          this.config.providerTimeoutMs,
        );
      }
      throw error;
    }

    const { statusCode } = response;

    if (statusCode === 429) {
      this.logger.warn("ESV API rate limit hit", { reference: reference.toString() });
      throw new ProviderRateLimitError(PROVIDER);
    }

    if (statusCode < 200 || statusCode >= 300) {
      this.logger.warn("ESV API returned an error status", {
        reference: reference.toString(),
        statusCode,
      });
      const message =
        statusCode === 401 || statusCode === 403
          ? "ESV API key was rejected. Check ESV_API_KEY."
          : "ESV API request failed. Try again later.";
      throw new ProviderUpstreamError(PROVIDER, message, statusCode);
    }

    const parsed = esvResponseSchema.safeParse(parseJson(response.text));
    if (!parsed.success) {
      throw new ProviderUpstreamError(
        PROVIDER,
        "ESV API returned an unreadable response.",
        statusCode,
      );
    }

    const passages = parsed.data.passages
      .map((passage) => passage.trim())
      .filter((passage) => passage.length > 0);

    if (passages.length === 0) {
      throw new ProviderNotFoundError(PROVIDER);
    }

    return {
      reference: reference.toString(),
      canonicalReference: parsed.data.canonical ?? null,
      version: this.version,
      rawText: passages.join("\n\n"),
      translationName: this.name,
      annotationIds: new Set<string>(),
    };
  }
}
