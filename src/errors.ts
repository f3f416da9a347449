/**
 * Error kinds raised by the checker, the manifest store and the creator.
 */

export type ZarrGuardErrorKind =
  | 'InvalidCoordinate'
  | 'InvalidShape'
  | 'ManifestCorrupt'
  | 'StoreUnreadable'
  | 'UnsupportedStrategy'
  | 'TargetExists';

export interface ZarrGuardErrorDetails {
  /** Store-relative variable name the failure belongs to */
  variable?: string;
  /** Filesystem path involved in the failure */
  path?: string;
  cause?: unknown;
}

export abstract class ZarrGuardError extends Error {
  abstract readonly kind: ZarrGuardErrorKind;

  readonly variable?: string;

  readonly path?: string;

  constructor(message: string, details: ZarrGuardErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.variable = details.variable;
    this.path = details.path;
  }
}

export class InvalidCoordinateError extends ZarrGuardError {
  readonly kind = 'InvalidCoordinate';

  constructor(message: string, details?: ZarrGuardErrorDetails) {
    super(message, details);
    this.name = 'InvalidCoordinateError';
  }
}

export class InvalidShapeError extends ZarrGuardError {
  readonly kind = 'InvalidShape';

  constructor(message: string, details?: ZarrGuardErrorDetails) {
    super(message, details);
    this.name = 'InvalidShapeError';
  }
}

export class ManifestCorruptError extends ZarrGuardError {
  readonly kind = 'ManifestCorrupt';

  constructor(message: string, details?: ZarrGuardErrorDetails) {
    super(message, details);
    this.name = 'ManifestCorruptError';
  }
}

export class StoreUnreadableError extends ZarrGuardError {
  readonly kind = 'StoreUnreadable';

  constructor(message: string, details?: ZarrGuardErrorDetails) {
    super(message, details);
    this.name = 'StoreUnreadableError';
  }
}

export class UnsupportedStrategyError extends ZarrGuardError {
  readonly kind = 'UnsupportedStrategy';

  readonly strategy: string;

  constructor(strategy: string) {
    super(`Unsupported no-data strategy "${strategy}". Expected "manifest" or "empty_chunks".`);
    this.name = 'UnsupportedStrategyError';
    this.strategy = strategy;
  }
}

export class TargetExistsError extends ZarrGuardError {
  readonly kind = 'TargetExists';

  constructor(path: string) {
    super(`Store already exists: ${path}`, { path });
    this.name = 'TargetExistsError';
  }
}

export function isZarrGuardError(value: unknown, kind?: ZarrGuardErrorKind): value is ZarrGuardError {
  if (!(value instanceof ZarrGuardError)) {
    return false;
  }
  return kind === undefined || value.kind === kind;
}

/**
 * Error message for anything thrown, including non-Error values.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
