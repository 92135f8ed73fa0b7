import { IDocumentRepository } from "../../../domain/scripture/repositories/IDocumentRepository";
import { SourceFile } from "../../../domain/scripture/types";

/**
 * In-memory implementation of IDocumentRepository for testing
 *
 * Keeps one Map of path to content per working directory
 */
export class InMemoryDocumentRepository implements IDocumentRepository {
  private directories: Map<string, Map<string, string>> = new Map();

  /** Number of writeSources calls, for asserting nothing was written */
  writeCount = 0;

  async listSources(workDir: string): Promise<SourceFile[]> {
    const files = this.directories.get(workDir);
    if (!files) {
      return [];
    }
    return Array.from(files.entries())
      .filter(([path]) => path.endsWith(".tex"))
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([path, content]) => ({ path, content }));
  }

  async writeSources(workDir: string, files: SourceFile[]): Promise<void> {
    this.writeCount++;
    const directory = this.directories.get(workDir) ?? new Map<string, string>();
    for (const file of files) {
      directory.set(file.path, file.content);
    }
    this.directories.set(workDir, directory);
  }

  // Test helper methods
  seed(workDir: string, files: Record<string, string>): void {
    this.directories.set(workDir, new Map(Object.entries(files)));
  }

  read(workDir: string, path: string): string | undefined {
    return this.directories.get(workDir)?.get(path);
  }
}
