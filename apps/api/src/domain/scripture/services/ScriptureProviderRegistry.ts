import { injectable, injectAll } from "tsyringe";
import { TYPES } from "../../../di/types";
import { UnsupportedVersionError } from "../../../shared/errors/ScriptureError";
import { IScriptureProvider } from "../ports/IScriptureProvider";
import { ScriptureVersion } from "../value-objects/ScriptureVersion";

/**
 * Selects the provider for a version tag. There is no fallback between
 * providers.
 */
@injectable()
export class ScriptureProviderRegistry {
  private readonly providers = new Map<ScriptureVersion, IScriptureProvider>();

  constructor(
    @injectAll(TYPES.ScriptureProvider)
    providers: IScriptureProvider[],
  ) {
    for (const provider of providers) {
      this.providers.set(provider.version, provider);
    }
  }

  get(version: ScriptureVersion): IScriptureProvider {
    const provider = this.providers.get(version);
    if (!provider) {
      throw new UnsupportedVersionError(version);
    }
    return provider;
  }
}
