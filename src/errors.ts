/**
 * Thrown when a string does not have the `MAJOR.MINOR.PATCH[-label[.counter]]` shape.
 */
export class InvalidVersionFormatError extends Error {
  readonly input: string;

  constructor(input: string) {
    super(`Invalid version format: '${input}'. Expected MAJOR.MINOR.PATCH with an optional -label[.counter] suffix`);
    this.name = 'InvalidVersionFormatError';
    this.input = input;
  }
}

/**
 * Thrown when a version is bumped by a severity that does not change it. Callers check for `none`
 * before bumping.
 */
export class InvalidBumpTypeError extends Error {
  readonly bumpType: string;

  constructor(bumpType: string) {
    super(`Cannot bump a version by '${bumpType}'. Check for 'none' before calling bump()`);
    this.name = 'InvalidBumpTypeError';
    this.bumpType = bumpType;
  }
}
