/**
 * System Prompts Configuration
 *
 * Prompts used by the optional scripture analysis pass.
 */

/**
 * Scripture formatting prompt
 * Asks for poetry blocks and divine-name tags on already-typeset LaTeX
 */
export const SCRIPTURE_ANALYSIS_PROMPT = `You format Bible passages that are already typeset in LaTeX.

1. Poetry: find the portions written as Hebrew poetry (parallel lines, blessings and curses, oracles, songs, elevated divine speech) and wrap only those portions in \\begin{poetry} and \\end{poetry}.
2. Divine name: where "LORD" or "the Lord" stands for the divine name (YHWH), replace it with \\name{Lord}. Leave it alone when it addresses a human master.

Rules:
- Reply with the passage text only.
- Keep every existing command exactly as it is, in particular \\vs{}, \\ch{} and \\hyperlink{}{}.
- Never wrap a whole passage as poetry when only part of it is poetic.
- Keep the spacing and line breaks.`;

export function buildScriptureAnalysisMessage(
  referenceLabel: string,
  markup: string,
): string {
  return `Reference: ${referenceLabel}\n\n${markup}`;
}
