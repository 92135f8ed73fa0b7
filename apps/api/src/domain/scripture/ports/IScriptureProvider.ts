import { LookupResult } from "../types";
import { LookupOptions } from "../value-objects/LookupOptions";
import { ScriptureReference } from "../value-objects/ScriptureReference";
import { ScriptureVersion } from "../value-objects/ScriptureVersion";

/**
 * A source of passage text for one translation.
 *
 * Implementations throw ProviderError subclasses and never retry.
 */
export interface IScriptureProvider {
  readonly version: ScriptureVersion;
  readonly name: string;

  fetch(reference: ScriptureReference, options: LookupOptions): Promise<LookupResult>;
}
