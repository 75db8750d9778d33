// Path: src/utils/error.ts
// Error taxonomy and helpers shared by every engine component

/**
 * Stable failure codes surfaced to the CLI and diagnostics layers.
 */
export type EngineErrorCode =
  | 'NotFound'
  | 'DuplicateName'
  | 'CryptoUnavailable'
  | 'PortRangeExhausted'
  | 'ConfigCorrupt'
  | 'ContainerUnhealthy'
  | 'PartialRotation'
  | 'InvalidInput'
  | 'InstanceLocked'
  | 'BackupFailed'
  | 'RuntimeFailure';

/**
 * Extract error message from unknown error type.
 * Safely handles Error objects, strings, and other types.
 *
 * @param err - Unknown error value
 * @returns Error message string
 */
export function extractErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  if (typeof err === 'string') {
    return err;
  }
  return String(err);
}

/**
 * Check if an error is a missing-file error from node:fs.
 */
export function isMissingFileError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Typed engine failure with code and metadata.
 */
export class EngineError extends Error {
  readonly code: EngineErrorCode;
  readonly metadata?: Record<string, unknown>;

  constructor(
    message: string,
    code: EngineErrorCode,
    options?: {
      cause?: unknown;
      metadata?: Record<string, unknown>;
    }
  ) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.metadata = options?.metadata;

    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export function isEngineError(err: unknown, code?: EngineErrorCode): err is EngineError {
  return err instanceof EngineError && (code === undefined || err.code === code);
}

/**
 * Wrap an unknown error into an EngineError.
 * EngineErrors pass through unchanged so their code survives nesting.
 *
 * @param err - Unknown error value
 * @param code - Error code used when err is not already an EngineError
 * @param metadata - Additional metadata
 */
export function wrapError(
  err: unknown,
  code: EngineErrorCode,
  metadata?: Record<string, unknown>
): EngineError {
  if (err instanceof EngineError) {
    return err;
  }
  return new EngineError(extractErrorMessage(err), code, { cause: err, metadata });
}
