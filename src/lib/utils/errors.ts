/**
 * Base error class for all xfsforge errors
 */
export class XfsForgeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "XfsForgeError";
    Object.setPrototypeOf(this, XfsForgeError.prototype);
  }
}

/**
 * Error thrown when an image does not carry the expected superblock signature
 * or its geometry cannot be used
 */
export class ImageFormatError extends XfsForgeError {
  /** Hex of the four signature bytes that were found, if any */
  readonly found?: string;

  constructor(message: string = "Not a valid XFS image", found?: string) {
    super(message);
    this.name = "ImageFormatError";
    this.found = found;
    Object.setPrototypeOf(this, ImageFormatError.prototype);
  }
}

/**
 * Error thrown when a buffer is shorter than the superblock header region
 */
export class HeaderTooShortError extends XfsForgeError {
  readonly length: number;

  constructor(length: number, required: number) {
    super(
      `Image is ${length} bytes, superblock header requires ${required} bytes`,
    );
    this.name = "HeaderTooShortError";
    this.length = length;
    Object.setPrototypeOf(this, HeaderTooShortError.prototype);
  }
}

/**
 * Error thrown when a value does not fit the width of its superblock field
 */
export class FieldRangeError extends XfsForgeError {
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = "FieldRangeError";
    this.field = field;
    Object.setPrototypeOf(this, FieldRangeError.prototype);
  }
}

/**
 * Error thrown when seed content entries overlap the header or each other
 */
export class SeedLayoutError extends XfsForgeError {
  constructor(message: string) {
    super(message);
    this.name = "SeedLayoutError";
    Object.setPrototypeOf(this, SeedLayoutError.prototype);
  }
}

/**
 * Error thrown when a command line value cannot be used
 */
export class InvalidArgumentError extends XfsForgeError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
    Object.setPrototypeOf(this, InvalidArgumentError.prototype);
  }
}
