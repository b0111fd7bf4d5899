/**
 * @hodata/core: shared infrastructure for hodata packages:
 * registry, configuration, errors, tracing and logging.
 *
 * @packageDocumentation
 */

export {
  HodataError,
  RegistryError,
  ConfigError,
  isHodataError,
  type HodataErrorCode,
} from "./errors.js";

export {
  createGenericRegistry,
  type GenericRegistry,
  type RegistryOptions,
  type DuplicateStrategy,
} from "./registry.js";

export {
  config,
  type HodataConfig,
  type ConfigValues,
  type ConfigPath,
  type FlagPath,
  type PairingMismatch,
} from "./config.js";

export {
  DispatchTracer,
  formatTrace,
  printTrace,
  getGlobalTracer,
  resetGlobalTracer,
  defaultWriter,
  type DispatchKind,
  type DispatchRecord,
  type LineWriter,
} from "./dispatch-trace.js";

export { createLogger, type Logger } from "./logger.js";

export { invariant } from "./safety.js";
