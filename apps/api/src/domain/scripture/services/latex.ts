import { ScriptureVersion } from "../value-objects/ScriptureVersion";

/**
 * LaTeX helpers for the scripture package.
 */

const LATEX_ESCAPES: Record<string, string> = {
  "\\": "\\textbackslash{}",
  "&": "\\&",
  "%": "\\%",
  $: "\\$",
  "#": "\\#",
  _: "\\_",
  "{": "\\{",
  "}": "\\}",
  "~": "\\textasciitilde{}",
  "^": "\\textasciicircum{}",
};

export function escapeLatex(text: string): string {
  return text.replace(/[\\&%$#_{}~^]/g, (ch) => LATEX_ESCAPES[ch] ?? ch);
}

/**
 * Wrap a translated passage in the scripture environment.
 */
export function renderPassageBlock(
  reference: string,
  version: ScriptureVersion,
  body: string,
): string {
  const referenceArg = reference.replace(/[[\]]/g, "");
  return [
    `\\begin{scripture}[${referenceArg}][version=${version}]`,
    "\\scripturefont",
    body.trim(),
    "\\end{scripture}",
  ].join("\n");
}

const SUPPORT_PACKAGE_PATTERN = /\\usepackage(\[[^\]]*\])?\{scripture\}/;
const SUPPORT_PACKAGE_LINE = "\\usepackage{scripture}\n";

/**
 * Declare the scripture package right after \documentclass (or at the top).
 * Idempotent: content that already loads the package is returned as is.
 */
export function ensureSupportPackage(content: string): string {
  if (SUPPORT_PACKAGE_PATTERN.test(content)) {
    return content;
  }

  const documentClass = /\\documentclass[^\n]*\n/.exec(content);
  if (!documentClass) {
    return SUPPORT_PACKAGE_LINE + content;
  }

  const index = documentClass.index + documentClass[0].length;
  return content.slice(0, index) + SUPPORT_PACKAGE_LINE + content.slice(index);
}

const DOCUMENT_END = "\\end{document}";

/**
 * Insert a block before the last \end{document}. Returns null when the
 * document has no terminal marker.
 */
export function insertBeforeDocumentEnd(
  content: string,
  block: string,
): string | null {
  const index = content.lastIndexOf(DOCUMENT_END);
  if (index === -1) {
    return null;
  }
  return `${content.slice(0, index)}\n${block}\n${content.slice(index)}`;
}
