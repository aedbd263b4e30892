/**
 * Version intervals in mathematical bracket notation.
 *
 * Accepted shapes:
 * - `""`                universal, matches every version
 * - `3.2.0`             at least 3.2.0
 * - `[3.2.0,4.0.0)`     `[`/`]` inclusive, `(`/`)` exclusive
 * - `[3.2.0,)` `(,4.0.0]`  a missing side is unbounded
 */
import {
  compareVersions,
  formatVersion,
  parseSemanticVersion,
  type SemanticVersion,
} from './semantic-version.js';

export interface VersionInterval {
  readonly lowerBound?: SemanticVersion;
  readonly upperBound?: SemanticVersion;
  readonly lowerInclusive: boolean;
  readonly upperInclusive: boolean;
}

/**
 * Outcome of parsing an interval.
 * `degraded` means part of the input was ignored and the interval is
 * looser than written; `issues` says what was dropped.
 */
export type IntervalParseResult =
  | { status: 'ok'; interval: VersionInterval }
  | { status: 'degraded'; interval: VersionInterval; issues: string[] };

export const UNIVERSAL_INTERVAL: VersionInterval = Object.freeze({
  lowerInclusive: false,
  upperInclusive: false,
});

const BRACKETED = /^([[(])([^,[\]()]*),([^,[\]()]*)([\])])$/;
const BARE = /^[^,[\]()\s]+$/;

/**
 * Parse interval notation. Never throws.
 */
export function parseVersionInterval(raw: string | null | undefined): IntervalParseResult {
  const source = (raw ?? '').trim();
  if (!source) {
    return { status: 'ok', interval: UNIVERSAL_INTERVAL };
  }

  if (BARE.test(source)) {
    const lower = parseSemanticVersion(source);
    if (!lower) {
      return degraded(UNIVERSAL_INTERVAL, [`unparsable version '${source}'`]);
    }
    return { status: 'ok', interval: makeInterval(lower, undefined, true, false) };
  }

  const match = BRACKETED.exec(source);
  if (!match) {
    return degraded(UNIVERSAL_INTERVAL, [`malformed interval '${source}'`]);
  }

  const [, open, lowerText, upperText, close] = match;
  const issues: string[] = [];
  const lower = parseBound(lowerText, 'lower', issues);
  const upper = parseBound(upperText, 'upper', issues);
  const interval = makeInterval(lower, upper, open === '[', close === ']');

  return issues.length > 0 ? degraded(interval, issues) : { status: 'ok', interval };
}

/**
 * Parse interval notation, keeping only the interval.
 */
export function toVersionInterval(raw: string | null | undefined): VersionInterval {
  return parseVersionInterval(raw).interval;
}

/**
 * True when the interval has no bound on either side.
 */
export function isUniversal(interval: VersionInterval): boolean {
  return !interval.lowerBound && !interval.upperBound;
}

/**
 * Whether `candidate` lies inside the interval.
 * Exclusive bounds reject equality, inclusive bounds accept it.
 */
export function containsVersion(interval: VersionInterval, candidate: SemanticVersion): boolean {
  if (interval.lowerBound) {
    const cmp = compareVersions(candidate, interval.lowerBound);
    if (cmp < 0 || (cmp === 0 && !interval.lowerInclusive)) {
      return false;
    }
  }
  if (interval.upperBound) {
    const cmp = compareVersions(candidate, interval.upperBound);
    if (cmp > 0 || (cmp === 0 && !interval.upperInclusive)) {
      return false;
    }
  }
  return true;
}

/**
 * Human-readable condition such as `>=3.2.0 and <4.0.0`.
 * Display only; an interval without a lower bound renders as ''.
 */
export function renderVersionInterval(interval: VersionInterval): string {
  if (!interval.lowerBound) {
    return '';
  }
  const lower = `${interval.lowerInclusive ? '>=' : '>'}${formatVersion(interval.lowerBound)}`;
  if (!interval.upperBound) {
    return lower;
  }
  const upper = `${interval.upperInclusive ? '<=' : '<'}${formatVersion(interval.upperBound)}`;
  return `${lower} and ${upper}`;
}

function parseBound(
  text: string | undefined,
  side: 'lower' | 'upper',
  issues: string[]
): SemanticVersion | undefined {
  const trimmed = (text ?? '').trim();
  if (!trimmed) {
    return undefined;
  }
  const version = parseSemanticVersion(trimmed);
  if (!version) {
    issues.push(`unparsable ${side} bound '${trimmed}'`);
    return undefined;
  }
  return version;
}

function makeInterval(
  lowerBound: SemanticVersion | undefined,
  upperBound: SemanticVersion | undefined,
  lowerInclusive: boolean,
  upperInclusive: boolean
): VersionInterval {
  return Object.freeze({ lowerBound, upperBound, lowerInclusive, upperInclusive });
}

function degraded(interval: VersionInterval, issues: string[]): IntervalParseResult {
  return { status: 'degraded', interval, issues };
}
