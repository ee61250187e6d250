import { InvalidBumpTypeError, InvalidVersionFormatError } from '@/errors';
import type { BumpType, Prerelease } from '@/types';
import { BUMP_TYPE, PRERELEASE_LABEL_REGEX, VERSION_REGEX } from '@/utils/constants';

/**
 * Asserts that a version component is a non-negative safe integer.
 */
function assertComponent(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`Version ${name} must be a non-negative integer. Got: ${value}`);
  }
}

/**
 * Compares two prerelease identifiers. Labels compare by code unit; for equal labels a missing counter
 * orders before any counter.
 */
function comparePrerelease(a: Prerelease, b: Prerelease): number {
  if (a.label !== b.label) {
    return a.label < b.label ? -1 : 1;
  }
  if (a.counter === b.counter) {
    return 0;
  }
  if (a.counter === null) {
    return -1;
  }
  if (b.counter === null) {
    return 1;
  }

  return a.counter < b.counter ? -1 : 1;
}

/**
 * An immutable three-part version with an optional prerelease identifier.
 *
 * Ordering compares `(major, minor, patch)` lexicographically; a prerelease orders strictly before the
 * otherwise-equal release (`1.2.0-rc.1 < 1.2.0`).
 *
 * @example
 * ```typescript
 * const next = Version.parse('1.4.7').bump('minor');
 * next.toString(); // → '1.5.0'
 * next.withPrerelease('rc', 1).toString(); // → '1.5.0-rc.1'
 * ```
 */
export class Version {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
  readonly prerelease: Prerelease | null;

  constructor(major: number, minor: number, patch: number, prerelease: Prerelease | null = null) {
    assertComponent('major', major);
    assertComponent('minor', minor);
    assertComponent('patch', patch);

    if (prerelease !== null) {
      if (!PRERELEASE_LABEL_REGEX.test(prerelease.label)) {
        throw new RangeError(
          `Prerelease label must start with a letter and contain only letters, digits or hyphens. Got: '${prerelease.label}'`,
        );
      }
      if (prerelease.counter !== null) {
        assertComponent('prerelease counter', prerelease.counter);
      }
    }

    this.major = major;
    this.minor = minor;
    this.patch = patch;
    this.prerelease = prerelease === null ? null : Object.freeze({ ...prerelease });
    Object.freeze(this);
  }

  /**
   * Parses `MAJOR.MINOR.PATCH` with an optional `-label` or `-label.counter` suffix.
   *
   * @throws {InvalidVersionFormatError} For any other shape, including a leading `v` or surrounding whitespace,
   *   and for numbers too large to represent exactly.
   */
  static parse(text: string): Version {
    const match = VERSION_REGEX.exec(text);
    if (!match) {
      throw new InvalidVersionFormatError(text);
    }

    const [, major, minor, patch, label, counter] = match;
    const components = [major, minor, patch].map((part) => Number.parseInt(part, 10));
    const prereleaseCounter = counter === undefined ? null : Number.parseInt(counter, 10);
    const exact = components.every(Number.isSafeInteger) && (prereleaseCounter ?? 0) <= Number.MAX_SAFE_INTEGER;

    // Digits beyond the safe integer range would round to a different version
    if (!exact) {
      throw new InvalidVersionFormatError(text);
    }

    const prerelease = label === undefined ? null : { label, counter: prereleaseCounter };
    return new Version(components[0], components[1], components[2], prerelease);
  }

  /**
   * Comparator suitable for `Array.prototype.sort`.
   */
  static compare(a: Version, b: Version): number {
    return a.compare(b);
  }

  get isPrerelease(): boolean {
    return this.prerelease !== null;
  }

  /**
   * Returns the next version for the given severity. The result never carries a prerelease.
   *
   * - `major` increments major and resets minor and patch
   * - `minor` increments minor and resets patch
   * - `patch` increments patch
   *
   * @throws {InvalidBumpTypeError} When called with `none`.
   */
  bump(bumpType: BumpType): Version {
    switch (bumpType) {
      case BUMP_TYPE.MAJOR:
        return new Version(this.major + 1, 0, 0);
      case BUMP_TYPE.MINOR:
        return new Version(this.major, this.minor + 1, 0);
      case BUMP_TYPE.PATCH:
        return new Version(this.major, this.minor, this.patch + 1);
      default:
        throw new InvalidBumpTypeError(bumpType);
    }
  }

  /**
   * Returns a copy of this version's numeric core carrying the given prerelease identifier.
   */
  withPrerelease(label: string, counter: number | null = null): Version {
    return new Version(this.major, this.minor, this.patch, { label, counter });
  }

  /**
   * Returns the numeric core without any prerelease identifier.
   */
  withoutPrerelease(): Version {
    return this.prerelease === null ? this : new Version(this.major, this.minor, this.patch);
  }

  /**
   * @returns -1, 0 or 1 as this version orders before, equal to or after `other`.
   */
  compare(other: Version): number {
    for (const key of ['major', 'minor', 'patch'] as const) {
      if (this[key] !== other[key]) {
        return this[key] < other[key] ? -1 : 1;
      }
    }

    if (this.prerelease === null || other.prerelease === null) {
      if (this.prerelease === other.prerelease) {
        return 0;
      }
      return this.prerelease === null ? 1 : -1;
    }

    return comparePrerelease(this.prerelease, other.prerelease);
  }

  equals(other: Version): boolean {
    return this.compare(other) === 0;
  }

  toString(): string {
    const core = `${this.major}.${this.minor}.${this.patch}`;
    if (this.prerelease === null) {
      return core;
    }

    const { label, counter } = this.prerelease;
    return counter === null ? `${core}-${label}` : `${core}-${label}.${counter}`;
  }
}
