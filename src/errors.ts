/**
 * Error Types
 *
 * Every failure raised by the runtime extends TreeError, so callers can
 * catch broadly or discriminate with instanceof.
 */

import { formatPath } from "./types.js";
import type { PathSegment } from "./types.js";

export class TreeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed arguments: wrong shape of name/following/path/codec input. */
export class InvalidArgumentError extends TreeError {
  constructor(
    message: string,
    public readonly argument?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class NavigationError extends TreeError {
  constructor(
    message: string,
    public readonly path: PathSegment[]
  ) {
    super(message);
  }
}

export class UnknownFieldError extends NavigationError {
  constructor(
    public readonly field: string,
    path: PathSegment[],
    owner?: string
  ) {
    super(
      owner
        ? `${owner} has no field "${field}" (at ${formatPath(path)})`
        : `No field "${field}" at ${formatPath(path)}`,
      path
    );
  }
}

export class IndexOutOfRangeError extends NavigationError {
  constructor(
    public readonly index: number,
    public readonly length: number,
    path: PathSegment[]
  ) {
    super(
      `Index ${index} out of range for list of length ${length} at ${formatPath(path)}`,
      path
    );
  }
}

export class IndexExpectedError extends NavigationError {
  constructor(
    public readonly token: PathSegment,
    path: PathSegment[]
  ) {
    super(
      `Expected an integer index at ${formatPath(path)}, got ${JSON.stringify(token)}`,
      path
    );
  }
}

export class AbsentValueError extends NavigationError {
  constructor(path: PathSegment[]) {
    super(`Absent value at ${formatPath(path)}`, path);
  }
}

export class MalformedPathError extends NavigationError {
  constructor(
    public readonly position: number,
    path: PathSegment[]
  ) {
    super(
      position === 0
        ? "First path token must be a field name or an index"
        : `Path token ${position} must be a field name or an index`,
      path
    );
  }
}

/** A typed accessor found a value of another kind. */
export class UnexpectedValueError extends NavigationError {
  constructor(
    public readonly expected: string,
    public readonly actual: string,
    path: PathSegment[]
  ) {
    super(
      `Expected ${expected} at ${formatPath(path)}, found ${actual}`,
      path
    );
  }
}

/** External input does not conform to the declared structure. */
export class StructureError extends TreeError {
  constructor(
    message: string,
    public readonly path: PathSegment[] = [],
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class UnknownKindError extends StructureError {
  constructor(
    public readonly apiVersion: string | undefined,
    public readonly kind: string | undefined,
    path: PathSegment[] = []
  ) {
    super(
      apiVersion === undefined && kind === undefined
        ? "Cannot select a descriptor: no apiVersion/kind markers and no target given"
        : `Unknown apiVersion/kind: ${String(apiVersion)}/${String(kind)}`,
      path
    );
  }
}

export class MissingFieldError extends StructureError {
  constructor(
    public readonly descriptorKey: string,
    public readonly field: string,
    path: PathSegment[]
  ) {
    super(
      `Missing required field "${field}" of ${descriptorKey} at ${formatPath(path)}`,
      path
    );
  }
}

export class OwnershipError extends TreeError {}

export class ConfigurationError extends TreeError {}

export class UnsupportedStyleError extends ConfigurationError {
  constructor(
    public readonly style: string,
    supported: readonly string[]
  ) {
    super(
      `Unsupported source style "${style}"; use one of: ${supported.join(", ")}`
    );
  }
}

export class RegistryError extends TreeError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
    options?: { cause?: unknown }
  ) {
    super(
      issues.length > 0 ? `${message}: ${issues.join("; ")}` : message,
      options
    );
  }
}
