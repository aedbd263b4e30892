/**
 * Tests for version interval parsing, containment and rendering.
 */
import { describe, it, expect } from 'vitest';
import {
  UNIVERSAL_INTERVAL,
  containsVersion,
  isUniversal,
  parseVersionInterval,
  renderVersionInterval,
  toVersionInterval,
} from '../../../../src/core/version/interval.js';
import { parseSemanticVersion, type SemanticVersion } from '../../../../src/core/version/semantic-version.js';

function v(raw: string): SemanticVersion {
  const version = parseSemanticVersion(raw);
  if (!version) {
    throw new Error(`bad test version ${raw}`);
  }
  return version;
}

function contains(range: string, version: string): boolean {
  return containsVersion(toVersionInterval(range), v(version));
}

describe('parseVersionInterval', () => {
  it('should treat an empty string as universal', () => {
    const result = parseVersionInterval('');

    expect(result.status).toBe('ok');
    expect(isUniversal(result.interval)).toBe(true);
  });

  it('should treat whitespace, null and undefined as universal', () => {
    expect(isUniversal(toVersionInterval('   '))).toBe(true);
    expect(isUniversal(toVersionInterval(null))).toBe(true);
    expect(isUniversal(toVersionInterval(undefined))).toBe(true);
  });

  it('should parse a bare version as an inclusive lower bound', () => {
    const result = parseVersionInterval('3.2.0');

    expect(result.status).toBe('ok');
    expect(result.interval.lowerBound?.version).toBe('3.2.0');
    expect(result.interval.lowerInclusive).toBe(true);
    expect(result.interval.upperBound).toBeUndefined();
  });

  it('should parse a closed interval', () => {
    const { interval } = parseVersionInterval('[1.0.0,2.0.0]');

    expect(interval.lowerBound?.version).toBe('1.0.0');
    expect(interval.upperBound?.version).toBe('2.0.0');
    expect(interval.lowerInclusive).toBe(true);
    expect(interval.upperInclusive).toBe(true);
  });

  it('should parse exclusive brackets', () => {
    const { interval } = parseVersionInterval('(1.0.0,2.0.0)');

    expect(interval.lowerInclusive).toBe(false);
    expect(interval.upperInclusive).toBe(false);
  });

  it('should parse prerelease bounds', () => {
    const { interval } = parseVersionInterval('[3.2.0,3.5.0-M1)');

    expect(interval.upperBound?.version).toBe('3.5.0-M1');
    expect(interval.upperInclusive).toBe(false);
  });

  it('should leave an empty side unbounded', () => {
    const lowerOnly = toVersionInterval('[3.2.0,)');
    const upperOnly = toVersionInterval('(,4.0.0]');

    expect(lowerOnly.lowerBound?.version).toBe('3.2.0');
    expect(lowerOnly.upperBound).toBeUndefined();
    expect(upperOnly.lowerBound).toBeUndefined();
    expect(upperOnly.upperBound?.version).toBe('4.0.0');
    expect(upperOnly.upperInclusive).toBe(true);
  });

  it('should tolerate spaces around the bounds', () => {
    const { interval, status } = parseVersionInterval(' [ 1.0.0 , 2.0.0 ) ');

    expect(status).toBe('ok');
    expect(interval.lowerBound?.version).toBe('1.0.0');
    expect(interval.upperBound?.version).toBe('2.0.0');
  });

  it('should read dotted qualifiers in bounds', () => {
    const { interval, status } = parseVersionInterval('[2.7.10.RELEASE,3.0.0.M1)');

    expect(status).toBe('ok');
    expect(interval.lowerBound?.version).toBe('2.7.10');
    expect(interval.upperBound?.version).toBe('3.0.0-M1');
  });

  it('should drop an unparsable bound and report it', () => {
    const result = parseVersionInterval('[abc,2.0.0)');

    expect(result.status).toBe('degraded');
    expect(result.interval.lowerBound).toBeUndefined();
    expect(result.interval.upperBound?.version).toBe('2.0.0');
    if (result.status === 'degraded') {
      expect(result.issues).toEqual(["unparsable lower bound 'abc'"]);
    }
  });

  it('should degrade an unparsable bare version to universal', () => {
    const result = parseVersionInterval('latest');

    expect(result.status).toBe('degraded');
    expect(isUniversal(result.interval)).toBe(true);
  });

  it.each(['[1.0.0', '1.0.0,2.0.0', '[]', '[1.0.0,2.0.0,3.0.0]', '{1.0.0,2.0.0}', '[1.0.0;2.0.0]'])(
    'should degrade malformed input %s to universal',
    (raw) => {
      const result = parseVersionInterval(raw);

      expect(result.status).toBe('degraded');
      expect(result.interval).toBe(UNIVERSAL_INTERVAL);
    }
  );

  it('should return frozen intervals', () => {
    expect(Object.isFrozen(toVersionInterval('[1.0.0,2.0.0]'))).toBe(true);
    expect(Object.isFrozen(UNIVERSAL_INTERVAL)).toBe(true);
  });
});

describe('containsVersion', () => {
  it('should contain every version in the universal interval', () => {
    for (const version of ['0.0.1', '1.0.0', '3.2.0-SNAPSHOT', '99.99.99']) {
      expect(containsVersion(UNIVERSAL_INTERVAL, v(version))).toBe(true);
    }
  });

  it('should accept the bound of a lower-inclusive interval', () => {
    expect(contains('[3.2.0,)', '3.2.0')).toBe(true);
    expect(contains('[3.2.0,)', '3.1.9')).toBe(false);
  });

  it('should reject the bound of a lower-exclusive interval', () => {
    expect(contains('(3.2.0,)', '3.2.0')).toBe(false);
    expect(contains('(3.2.0,)', '3.2.1')).toBe(true);
  });

  it('should honour both inclusive bounds of a closed interval', () => {
    expect(contains('[1.0.0,2.0.0]', '1.0.0')).toBe(true);
    expect(contains('[1.0.0,2.0.0]', '1.5.0')).toBe(true);
    expect(contains('[1.0.0,2.0.0]', '2.0.0')).toBe(true);
    expect(contains('[1.0.0,2.0.0]', '0.9.9')).toBe(false);
    expect(contains('[1.0.0,2.0.0]', '2.0.1')).toBe(false);
  });

  it('should reject the bound of an upper-exclusive interval', () => {
    expect(contains('[1.0.0,2.0.0)', '2.0.0')).toBe(false);
    expect(contains('[1.0.0,2.0.0)', '1.9.9')).toBe(true);
  });

  it('should treat a bare version as a minimum', () => {
    expect(contains('3.2.0', '3.2.0')).toBe(true);
    expect(contains('3.2.0', '10.0.0')).toBe(true);
    expect(contains('3.2.0', '3.1.12')).toBe(false);
  });

  it('should bound only the upper side when the lower is empty', () => {
    expect(contains('(,4.0.0)', '0.0.1')).toBe(true);
    expect(contains('(,4.0.0)', '4.0.0')).toBe(false);
    expect(contains('(,4.0.0]', '4.0.0')).toBe(true);
  });

  it('should order prereleases below their release', () => {
    expect(contains('[3.2.0,3.5.0-M1)', '3.4.0-SNAPSHOT')).toBe(true);
    expect(contains('[3.2.0,3.5.0-M1)', '3.5.0-M1')).toBe(false);
    expect(contains('[3.2.0,3.5.0-M1)', '3.5.0')).toBe(false);
    expect(contains('[3.2.0,)', '3.2.0-RC1')).toBe(false);
  });

  it('should compare numerically rather than lexically', () => {
    expect(contains('[3.2.0,3.10.0)', '3.9.0')).toBe(true);
    expect(contains('[3.2.0,3.10.0)', '3.10.0')).toBe(false);
  });

  it('should compare dotted release versions by their full patch number', () => {
    expect(contains('[2.7.10.RELEASE,3.0.0.M1)', '2.7.9')).toBe(false);
    expect(contains('[2.7.10.RELEASE,3.0.0.M1)', '2.7.10')).toBe(true);
    expect(contains('[2.7.5,2.8.0)', '2.7.18.RELEASE')).toBe(true);
    expect(contains('[2.7.10.RELEASE,3.0.0.M1)', '3.0.0')).toBe(false);
  });

  it('should keep the constraint of the parsable side of a degraded interval', () => {
    expect(contains('[bogus,2.0.0)', '0.1.0')).toBe(true);
    expect(contains('[bogus,2.0.0)', '2.0.0')).toBe(false);
  });

  it('should match the bound rules for every documented shape', () => {
    const cases: Array<[string, string, boolean]> = [
      ['', '1.0.0', true],
      ['1.0.0', '0.9.0', false],
      ['1.0.0', '1.0.0', true],
      ['[1.0.0,2.0.0]', '2.0.0', true],
      ['[1.0.0,2.0.0)', '2.0.0', false],
      ['(1.0.0,2.0.0]', '1.0.0', false],
      ['(1.0.0,2.0.0)', '1.0.1', true],
      ['[1.0.0,)', '100.0.0', true],
      ['(,2.0.0)', '1.9.9', true],
      ['(,2.0.0)', '2.0.0', false],
    ];

    for (const [range, version, expected] of cases) {
      expect(contains(range, version), `${version} in ${range || '(universal)'}`).toBe(expected);
    }
  });
});

describe('renderVersionInterval', () => {
  it('should render both bounds', () => {
    expect(renderVersionInterval(toVersionInterval('[3.2.0,4.0.0)'))).toBe('>=3.2.0 and <4.0.0');
    expect(renderVersionInterval(toVersionInterval('(3.2.0,4.0.0]'))).toBe('>3.2.0 and <=4.0.0');
  });

  it('should render a lower bound alone', () => {
    expect(renderVersionInterval(toVersionInterval('3.2.0'))).toBe('>=3.2.0');
    expect(renderVersionInterval(toVersionInterval('(3.2.0,)'))).toBe('>3.2.0');
  });

  it('should render an empty string without a lower bound', () => {
    expect(renderVersionInterval(UNIVERSAL_INTERVAL)).toBe('');
    expect(renderVersionInterval(toVersionInterval('(,4.0.0)'))).toBe('');
  });
});
