const STRUCTURAL_MACRO = /\\(?:vs|ch)\{[^}]*\}|\\hyperlink\{[^}]*\}\{[^}]*\}/g;

function countMacros(text: string): Map<string, number> {
  const counts = new Map<string, number>();
  for (const macro of text.match(STRUCTURAL_MACRO) ?? []) {
    counts.set(macro, (counts.get(macro) ?? 0) + 1);
  }
  return counts;
}

/**
 * The analysis pass may only add markup. Its output is kept when every
 * verse, chapter and hyperlink macro of the input survives in it.
 */
export function preservesStructuralMacros(before: string, after: string): boolean {
  const remaining = countMacros(after);
  for (const [macro, count] of countMacros(before)) {
    if ((remaining.get(macro) ?? 0) < count) {
      return false;
    }
  }
  return true;
}
