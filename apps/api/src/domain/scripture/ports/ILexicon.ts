import { LexiconEntry } from "../types";

export interface ILexicon {
  getEntry(id: string): Promise<LexiconEntry | null>;
}
