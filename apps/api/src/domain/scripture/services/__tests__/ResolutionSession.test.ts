import { describe, it, expect } from "@jest/globals";
import { ResolutionSession } from "../ResolutionSession";

describe("ResolutionSession", () => {
  it("should accumulate and sort collected values once complete", () => {
    const session = new ResolutionSession();

    session.recordAnnotationIds(["166", "26"]);
    session.recordAnnotationIds(new Set(["26", "2316"]));
    session.recordCanonicalReference("Romans 8:1");
    session.recordCanonicalReference("John 3:16");
    session.recordCanonicalReference("John 3:16");
    session.complete();

    expect(session.isComplete()).toBe(true);
    expect(session.collectedAnnotationIds()).toEqual(["26", "166", "2316"]);
    expect(session.collectedCanonicalReferences()).toEqual([
      "John 3:16",
      "Romans 8:1",
    ]);
  });

  it("should not be read while collecting", () => {
    const session = new ResolutionSession();

    expect(() => session.collectedAnnotationIds()).toThrow(
      "Resolution session is still collecting",
    );
  });

  it("should not be written after completion", () => {
    const session = new ResolutionSession();
    session.complete();

    expect(() => session.recordCanonicalReference("John 3:16")).toThrow(
      "Resolution session is complete and can no longer be written",
    );
  });
});
