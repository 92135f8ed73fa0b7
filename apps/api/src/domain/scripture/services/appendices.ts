import { mapWithConcurrency } from "../../../shared/utils/concurrency";
import { ICommentaryLookup } from "../ports/ICommentaryLookup";
import { ILexicon } from "../ports/ILexicon";
import { CommentaryResult, CommentarySource } from "../types";
import { escapeLatex } from "./latex";

const MAX_COMMENTARY_LENGTH = 2000;

/**
 * Greek word-study appendix for the collected annotation ids.
 *
 * Every id gets an entry, even without a lexicon definition, so each
 * \hyperlink emitted in a passage has its target.
 */
export async function buildWordStudyAppendix(
  annotationIds: readonly string[],
  lexicon: ILexicon,
): Promise<string> {
  if (annotationIds.length === 0) {
    return "";
  }

  const sorted = [...annotationIds].sort((a, b) => Number(a) - Number(b));

  const lines = [
    "\\newpage",
    "\\section*{Greek Word Study}",
    "\\addcontentsline{toc}{section}{Greek Word Study}",
    "",
    "\\begin{description}",
  ];

  for (const id of sorted) {
    const entry = await lexicon.getEntry(id);
    const headword = entry?.headword ?? "";
    const transliteration = entry?.transliteration ?? "";
    const gloss = escapeLatex(entry?.gloss || "Definition not available");

    let label = `G${id}`;
    if (headword) {
      label += ` ({\\textnormal{\\greekfont ${headword}}})`;
    }

    lines.push(
      `\\item[\\hypertarget{strongs-${id}}{${label}}] \\textbf{${transliteration}} --- ${gloss}`,
    );
  }

  lines.push("\\end{description}");
  return lines.join("\n");
}

function formatCommentaryText(text: string): string {
  const truncated =
    text.length > MAX_COMMENTARY_LENGTH
      ? `${text.slice(0, MAX_COMMENTARY_LENGTH)}...`
      : text;
  return escapeLatex(truncated).split("\n\n").join("\n\n\\par\n");
}

/**
 * Commentary appendix: one subsection per reference (sorted) with one
 * paragraph per source that had something to say. Empty when no source
 * returned anything.
 */
export async function buildCommentaryAppendix(
  references: readonly string[],
  sources: readonly CommentarySource[],
  lookup: ICommentaryLookup,
  concurrency: number,
): Promise<string> {
  if (references.length === 0 || sources.length === 0) {
    return "";
  }

  const sortedReferences = [...references].sort();
  const requests = sortedReferences.flatMap((reference) =>
    sources.map((source) => ({ reference, source })),
  );

  const results = await mapWithConcurrency(requests, concurrency, (request) =>
    lookup.lookup(request.reference, request.source),
  );

  const byReference = new Map<string, CommentaryResult[]>();
  requests.forEach((request, index) => {
    const result = results[index];
    if (!result || result.entries.length === 0) {
      return;
    }
    const list = byReference.get(request.reference) ?? [];
    list.push(result);
    byReference.set(request.reference, list);
  });

  if (byReference.size === 0) {
    return "";
  }

  const lines = [
    "\\newpage",
    "\\section*{Commentary Notes}",
    "\\addcontentsline{toc}{section}{Commentary Notes}",
    "",
  ];

  for (const reference of sortedReferences) {
    const commentaries = byReference.get(reference);
    if (!commentaries) {
      continue;
    }

    lines.push(`\\subsection*{${escapeLatex(reference)}}`, "");

    for (const commentary of commentaries) {
      lines.push(`\\paragraph{${escapeLatex(commentary.sourceName)}}`, "");
      lines.push(formatCommentaryText(commentary.entries[0].text), "");
    }
  }

  return lines.join("\n");
}
