/**
 * @seqkit/core
 *
 * Shared foundation for the seqkit packages:
 * - Argument errors and call-time guards
 * - Eq / Hash comparer typeclasses
 * - The O(1) size capability (`tryGetCount`)
 * - Configuration (cosmiconfig + SEQKIT_* env) and a console logger
 */

export { ArgumentError, ArgumentOutOfRangeError, type ArgumentErrorReason } from "./errors.js";

export {
  isIterable,
  requireIterable,
  requireFunction,
  requireDefined,
  requireComparer,
  requireInteger,
  requireIntegerAtLeast,
} from "./guards.js";

export {
  eqDefault,
  isDefaultEq,
  eqNumber,
  eqString,
  eqStringIgnoreCase,
  makeEq,
  eqBy,
  isHash,
  hashNumber,
  hashString,
  eqHashNumber,
  eqHashString,
  eqHashStringIgnoreCase,
  eqHashBy,
  type Eq,
  type Hash,
  type EqHash,
} from "./typeclasses.js";

export { tryGetCount, isSized, type Sized } from "./size.js";

export {
  config,
  loadConfigFromEnv,
  type SeqkitConfig,
  type EqualityConfig,
  type EqualityStrategy,
} from "./config.js";

export { createLogger, type Logger } from "./logger.js";
