import { UnsupportedVersionError } from "../../../shared/errors/ScriptureError";

/**
 * Supported translations.
 *
 * ESV is the primary provider (credentialed, plain text). NET is the
 * secondary provider (no credential, HTML markup with lexical tags).
 */
export const SCRIPTURE_VERSIONS = ["ESV", "NET"] as const;

export type ScriptureVersion = (typeof SCRIPTURE_VERSIONS)[number];

export const PRIMARY_VERSION: ScriptureVersion = "ESV";

export function isScriptureVersion(value: string): value is ScriptureVersion {
  return SCRIPTURE_VERSIONS.some((version) => version === value);
}

/**
 * Parse a version tag case-insensitively. An empty tag means the primary version.
 */
export function parseScriptureVersion(tag: string | undefined): ScriptureVersion {
  const normalized = (tag ?? "").trim().toUpperCase();
  if (!normalized) {
    return PRIMARY_VERSION;
  }

  if (!isScriptureVersion(normalized)) {
    throw new UnsupportedVersionError(tag ?? "");
  }

  return normalized;
}
