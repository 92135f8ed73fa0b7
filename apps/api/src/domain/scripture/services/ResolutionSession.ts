/**
 * State collected during one resolution pass.
 *
 * Created per pass and discarded with it. Directives record into it while
 * they resolve; the appendix step reads it once the pass is complete.
 * Each record call is synchronous, so concurrently resolving directives
 * never interleave inside a write.
 */
export class ResolutionSession {
  private readonly annotationIds = new Set<string>();
  private readonly canonicalReferences = new Set<string>();
  private completed = false;

  recordAnnotationIds(ids: Iterable<string>): void {
    this.assertOpen();
    for (const id of ids) {
      this.annotationIds.add(id);
    }
  }

  recordCanonicalReference(reference: string): void {
    this.assertOpen();
    this.canonicalReferences.add(reference);
  }

  complete(): void {
    this.completed = true;
  }

  isComplete(): boolean {
    return this.completed;
  }

  /** Collected annotation ids, sorted numerically. */
  collectedAnnotationIds(): string[] {
    this.assertComplete();
    return [...this.annotationIds].sort((a, b) => Number(a) - Number(b));
  }

  collectedCanonicalReferences(): string[] {
    this.assertComplete();
    return [...this.canonicalReferences].sort();
  }

  private assertOpen(): void {
    if (this.completed) {
      throw new Error("Resolution session is complete and can no longer be written");
    }
  }

  private assertComplete(): void {
    if (!this.completed) {
      throw new Error("Resolution session is still collecting");
    }
  }
}
