/**
 * @datamask/mask - Field masking for JSON payloads.
 *
 * Rewrites the values of sensitive fields (names, e-mail addresses,
 * phone numbers, and anything a custom strategy covers) before a
 * payload leaves the system. Only allowlisted field names are touched;
 * structure, other fields and non-string values are left as they are.
 *
 * ```typescript
 * import { MaskingEngine } from '@datamask/mask';
 *
 * const engine = new MaskingEngine();
 * engine.maskDocument('{"name":"John Smith"}');
 * // '{"name":"J*** S****"}'
 * ```
 *
 * The same engine can sit on a byte stream (`maskStream`,
 * `createMaskingTransform`) or in an exchange plugin pipeline
 * (`createMaskingPlugin`).
 */

// Strategies
export type {
  MaskingStrategy,
  OptionalStrategyName,
  StrategyDefinition,
  TrailingDigitsOptions,
} from "./strategies.js";
export {
  DEFAULT_STRATEGIES,
  MASK_CHAR,
  OPTIONAL_STRATEGIES,
  OPTIONAL_STRATEGY_NAMES,
  accountNumberStrategy,
  defineStrategy,
  emailStrategy,
  maskDigitsKeepingLast,
  maskEmail,
  maskName,
  maskPhoneNumber,
  nameStrategy,
  phoneStrategy,
  trailingDigitsStrategy,
} from "./strategies.js";
export { StrategyRegistry } from "./registry.js";

// Allowlist
export {
  DEFAULT_FIELDS,
  createAllowlist,
  isAllowed,
  normalizeFieldName,
  parseFieldList,
} from "./allowlist.js";

// Engine
export type {
  MaskingConfig,
  MaskingEngineOptions,
  MaskingFailure,
  MaskingOptions,
  MaskingStats,
} from "./engine.js";
export {
  MaskingEngine,
  MaskingError,
  createMaskingConfig,
  createStats,
  describeConfig,
} from "./engine.js";

// Stream adapter
export type { ProblemCollector } from "./transform.js";
export { createMaskingTransform, createProblemCollector, maskStream } from "./transform.js";

// Configuration
export type { MaskConfigJson, MaskRuleJson } from "./config.js";
export {
  compileConfig,
  loadConfigFile,
  maskConfigSchema,
  parseConfig,
  resolveMaskingOptions,
} from "./config.js";

// Plugin
export type { MaskingPluginConfig } from "./plugin.js";
export { createMaskingPlugin } from "./plugin.js";

// Logging
export type { MaskLogger } from "./log.js";
export { consoleLogger, silentLogger } from "./log.js";
