/**
 * Error Types
 *
 * Every error raised by hodata packages extends `HodataError`, which carries
 * a stable `code` alongside the message so callers can branch without
 * matching on text.
 */

/** Stable error codes. */
export type HodataErrorCode =
  | "HO_REGISTRY"
  | "HO_CONFIG"
  | "HO_INVARIANT"
  | "HO_ASSOCIATION_CONFLICT"
  | "HO_MISSING_ASSOCIATION"
  | "HO_SHAPE_MISMATCH"
  | "HO_LENGTH_MISMATCH";

/**
 * Base class for all hodata errors.
 */
export class HodataError extends Error {
  constructor(
    readonly code: HodataErrorCode,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "HodataError";
  }
}

/**
 * Thrown when a registry rejects a duplicate key.
 */
export class RegistryError extends HodataError {
  constructor(
    readonly registry: string,
    readonly key: string,
    message: string,
  ) {
    super("HO_REGISTRY", message);
    this.name = "RegistryError";
  }
}

/**
 * Thrown when a configuration value has the wrong shape.
 */
export class ConfigError extends HodataError {
  constructor(
    readonly path: string,
    message: string,
  ) {
    super("HO_CONFIG", message);
    this.name = "ConfigError";
  }
}

/** Type guard for errors raised by hodata packages. */
export function isHodataError(error: unknown): error is HodataError {
  return error instanceof HodataError;
}
