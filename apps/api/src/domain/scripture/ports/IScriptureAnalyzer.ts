/**
 * Optional cosmetic pass over translated markup (poetry blocks, divine
 * name tags). Resolves to the input unchanged when it cannot help.
 */
export interface IScriptureAnalyzer {
  analyze(markup: string, referenceLabel: string): Promise<string>;
}
