#!/usr/bin/env node
/**
 * Resolve scripture placeholders in a LaTeX working directory.
 *
 * Usage:
 *   resolve-placeholders <workDir> <entryFile> [--word-study] [--commentary mhc,calvincommentaries]
 */

import "reflect-metadata";
import "dotenv/config";
import { container } from "../di/Container";
import { TYPES } from "../di/types";
import { ResolveDirectoryUseCase } from "../application/scripture/use-cases/ResolveDirectoryUseCase";
import { BatchResolutionError } from "../shared/errors/ScriptureError";
import {
  AppendixRequest,
  COMMENTARY_SOURCES,
  CommentarySource,
} from "../domain/scripture/types";

const USAGE =
  "Usage: resolve-placeholders <workDir> <entryFile> [--word-study] [--commentary mhc,calvincommentaries]";

export interface CliArgs {
  workDir: string;
  entryFile: string;
  appendices: AppendixRequest;
}

function isCommentarySource(value: string): value is CommentarySource {
  return COMMENTARY_SOURCES.some((source) => source === value);
}

export function parseCliArgs(argv: string[]): CliArgs {
  const positional: string[] = [];
  const appendices: AppendixRequest = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--word-study":
        appendices.wordStudy = true;
        break;
      case "--commentary": {
        const value = argv[++i];
        if (!value || value.startsWith("--")) {
          throw new Error(`--commentary needs a source list\n${USAGE}`);
        }
        const sources = value.split(",").map((s) => s.trim()).filter(Boolean);
        const unknown = sources.filter((s) => !isCommentarySource(s));
        if (unknown.length > 0) {
          throw new Error(`Unknown commentary source: ${unknown.join(", ")}`);
        }
        appendices.commentarySources = sources.filter(isCommentarySource);
        break;
      }
      default:
        if (arg.startsWith("--")) {
          throw new Error(`Unknown flag ${arg}\n${USAGE}`);
        }
        positional.push(arg);
    }
  }

  if (positional.length !== 2) {
    throw new Error(USAGE);
  }

  return { workDir: positional[0], entryFile: positional[1], appendices };
}

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));
  const useCase = container.resolve<ResolveDirectoryUseCase>(
    TYPES.ResolveDirectoryUseCase,
  );

  try {
    const result = await useCase.execute(args);
    console.log(
      `Resolved ${result.directives} placeholder(s); updated ${result.written.length} file(s).`,
    );
    for (const file of result.written) {
      console.log(`  ${file}`);
    }
  } catch (error) {
    if (error instanceof BatchResolutionError) {
      console.error(error.message);
      for (const failure of error.failures) {
        console.error(`  ${failure.directive}: ${failure.message}`);
      }
      process.exitCode = 1;
      return;
    }
    throw error;
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
