import { readdir, readFile, rename, rm, writeFile } from "fs/promises";
import path from "path";
import { injectable } from "tsyringe";
import { IDocumentRepository } from "../../../domain/scripture/repositories/IDocumentRepository";
import { SourceFile } from "../../../domain/scripture/types";
import { ValidationError } from "../../../shared/errors/DomainError";

/**
 * Filesystem implementation of IDocumentRepository
 *
 * Paths are reported with forward slashes, relative to the working
 * directory. Every file is first written to a temporary sibling; only when
 * all of them are on disk are they renamed into place. A failed write
 * removes the temporaries and leaves the originals untouched.
 */
@injectable()
export class FileSystemDocumentRepository implements IDocumentRepository {
  async listSources(workDir: string): Promise<SourceFile[]> {
    const root = path.resolve(workDir);
    const entries = await readdir(root, { recursive: true, withFileTypes: false });

    const texPaths = entries
      .filter((entry) => entry.endsWith(".tex"))
      .map((entry) => entry.split(path.sep).join("/"))
      .sort((a, b) => a.localeCompare(b));

    return Promise.all(
      texPaths.map(async (relative) => ({
        path: relative,
        content: await readFile(path.join(root, relative), "utf8"),
      })),
    );
  }

  async writeSources(workDir: string, files: SourceFile[]): Promise<void> {
    const root = path.resolve(workDir);

    const targets = files.map((file) => {
      const target = path.resolve(root, file.path);
      if (!target.startsWith(root + path.sep)) {
        throw new ValidationError(`Path escapes the working directory: ${file.path}`, "path");
      }
      return { target, temporary: `${target}.${process.pid}.tmp`, content: file.content };
    });

    try {
      for (const { temporary, content } of targets) {
        await writeFile(temporary, content, "utf8");
      }
    } catch (error) {
      await Promise.all(targets.map(({ temporary }) => rm(temporary, { force: true })));
      throw error;
    }

    for (const { target, temporary } of targets) {
      await rename(temporary, target);
    }
  }
}
