/**
 * Semantic version values used by compatibility checks.
 */
import semver, { type SemVer } from 'semver';

/** Immutable, totally ordered version value. */
export type SemanticVersion = SemVer;

// `2.7.18.RELEASE`, `3.0.0.M1`, `2.0.0.BUILD-SNAPSHOT`
const DOTTED_QUALIFIER = /^(\d+\.\d+\.\d+)\.([0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*)$/;
const RELEASE_QUALIFIERS = new Set(['RELEASE', 'FINAL', 'GA']);

/**
 * Parse a version string.
 *
 * A leading `v` or `=` is ignored. Dotted qualifiers are read as Spring
 * writes them: `.RELEASE` is dropped and any other qualifier becomes a
 * prerelease (`3.0.0.M1` is `3.0.0-M1`). Anything else that is not strict
 * semver is coerced (`3.2` becomes `3.2.0`). Returns null when the string
 * holds nothing version-like.
 */
export function parseSemanticVersion(raw: string): SemanticVersion | null {
  const trimmed = raw.trim().replace(/^[=v]+/, '');
  if (!trimmed) {
    return null;
  }
  const normalized = normalizeQualifier(trimmed);
  return semver.parse(normalized) ?? semver.coerce(normalized, { includePrerelease: true });
}

function normalizeQualifier(text: string): string {
  const match = DOTTED_QUALIFIER.exec(text);
  if (!match) {
    return text;
  }
  const [, core, qualifier] = match;
  return RELEASE_QUALIFIERS.has(qualifier.toUpperCase()) ? core : `${core}-${qualifier}`;
}

/**
 * Compare two versions by semver precedence: negative, zero or positive.
 */
export function compareVersions(a: SemanticVersion, b: SemanticVersion): -1 | 0 | 1 {
  return semver.compare(a, b);
}

/**
 * Display form of a version.
 */
export function formatVersion(version: SemanticVersion): string {
  return version.version;
}
