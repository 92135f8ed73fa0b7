import { CommentaryResult, CommentarySource } from "../types";

export interface ICommentaryLookup {
  /**
   * Commentary for a canonical reference, or null when the source has
   * nothing for it.
   */
  lookup(reference: string, source: CommentarySource): Promise<CommentaryResult | null>;
}
