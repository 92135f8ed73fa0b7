import { SourceFile } from "../types";

/**
 * Document Repository Interface
 *
 * Access to the LaTeX sources of a working directory. Paths are relative
 * to the working directory.
 */
export interface IDocumentRepository {
  /**
   * Every .tex source under the working directory, recursively
   */
  listSources(workDir: string): Promise<SourceFile[]>;

  /**
   * Replace the content of each given file in full
   */
  writeSources(workDir: string, files: SourceFile[]): Promise<void>;
}
