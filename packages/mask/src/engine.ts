/**
 * Masking engine.
 *
 * Parses a JSON document, walks every object at any depth and rewrites
 * string values whose field name is allowlisted and matched by a
 * strategy. Structure, non-sensitive fields and non-string leaves are
 * left alone.
 *
 * Numbers are parsed as lossless-json `LosslessNumber`s and written
 * back verbatim, so large integers and decimal spellings survive a pass.
 *
 * The engine fails open by default: a document it cannot parse or walk
 * is returned exactly as received. Set `failClosed` to get a
 * {@link MaskingError} instead.
 */

import type { JsonObject } from "@datamask/core";
import { isLosslessNumber, parse, stringify } from "lossless-json";

import { createAllowlist, isAllowed } from "./allowlist.js";
import { consoleLogger, errorMessage } from "./log.js";
import type { MaskLogger } from "./log.js";
import { StrategyRegistry } from "./registry.js";
import { DEFAULT_STRATEGIES } from "./strategies.js";
import type { MaskingStrategy } from "./strategies.js";

// --- Config ---

export interface MaskingOptions {
  /** Default: true. */
  enabled?: boolean;
  /** Comma-separated string or list. Empty or absent selects the default fields. */
  fields?: string | Iterable<string> | null;
  /** Ordered strategies. Default: name, email, phone. */
  strategies?: Iterable<MaskingStrategy>;
  /** Throw instead of passing malformed or unsupported documents through. Default: false. */
  failClosed?: boolean;
}

/** Immutable engine configuration. Replaced as a whole, never edited. */
export interface MaskingConfig {
  readonly enabled: boolean;
  readonly fields: ReadonlySet<string>;
  readonly registry: StrategyRegistry;
  readonly failClosed: boolean;
}

export function createMaskingConfig(options: MaskingOptions = {}): MaskingConfig {
  return Object.freeze({
    enabled: options.enabled ?? true,
    fields: createAllowlist(options.fields),
    registry: new StrategyRegistry(options.strategies ?? DEFAULT_STRATEGIES),
    failClosed: options.failClosed ?? false,
  });
}

/** One-line summary for startup logs. */
export function describeConfig(config: MaskingConfig): string {
  const strategies = config.registry.list.map((s) => s.name).join(", ");
  return (
    `Masking enabled: ${config.enabled}, ` +
    `Fields: ${[...config.fields].join(", ")}, ` +
    `Strategies: ${strategies || "none"}`
  );
}

// --- Stats ---

export interface MaskingStats {
  /** Number of field values rewritten. */
  totalMasked: number;
  /** Per-strategy counts. Only includes strategies that fired. */
  byStrategy: Record<string, number>;
}

export function createStats(): MaskingStats {
  return { totalMasked: 0, byStrategy: {} };
}

// --- Errors ---

export type MaskingFailure = "invalid-json" | "unsupported-root" | "internal";

/** Thrown by `maskDocument` only when the engine is configured fail-closed. */
export class MaskingError extends Error {
  readonly reason: MaskingFailure;

  constructor(reason: MaskingFailure, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "MaskingError";
    this.reason = reason;
  }
}

// --- Engine ---

export interface MaskingEngineOptions extends MaskingOptions {
  logger?: MaskLogger;
}

export class MaskingEngine {
  private current: MaskingConfig;
  private readonly logger: MaskLogger;

  constructor(options: MaskingEngineOptions = {}) {
    this.current = createMaskingConfig(options);
    this.logger = options.logger ?? consoleLogger;
  }

  get config(): MaskingConfig {
    return this.current;
  }

  /** Swap in a freshly built configuration. */
  reconfigure(options: MaskingOptions): void {
    this.current = createMaskingConfig(options);
  }

  /**
   * Append a strategy. The registry is replaced, not mutated, so a pass
   * already holding the old config finishes with the old list.
   */
  register(strategy: MaskingStrategy): void {
    const { enabled, fields, registry, failClosed } = this.current;
    this.current = Object.freeze({
      enabled,
      fields,
      registry: registry.register(strategy),
      failClosed,
    });
  }

  findStrategy(fieldName: string): MaskingStrategy | undefined {
    return this.current.registry.find(fieldName);
  }

  isMaskingEnabledForField(fieldName: string): boolean {
    return this.current.enabled && isAllowed(this.current.fields, fieldName);
  }

  /**
   * Mask a single field value, subject to the same gates as a document
   * walk: masking enabled, field allowlisted, a strategy matches.
   */
  maskValue(fieldName: string, value: string): string;
  maskValue(fieldName: string, value: string | null): string | null;
  maskValue(fieldName: string, value: string | null): string | null {
    if (value === null || !this.isMaskingEnabledForField(fieldName)) return value;
    const strategy = this.findStrategy(fieldName);
    return strategy ? strategy.apply(value) : value;
  }

  // Direct accessors: strategy lookup only, no allowlist gate.

  maskName(name: string): string;
  maskName(name: string | null): string | null;
  maskName(name: string | null): string | null {
    return this.applyFor("name", name);
  }

  maskPhoneNumber(phoneNumber: string): string;
  maskPhoneNumber(phoneNumber: string | null): string | null;
  maskPhoneNumber(phoneNumber: string | null): string | null {
    return this.applyFor("phone", phoneNumber);
  }

  maskEmail(email: string): string;
  maskEmail(email: string | null): string | null;
  maskEmail(email: string | null): string | null {
    return this.applyFor("email", email);
  }

  /**
   * Walk an object tree the caller owns and mask it in place.
   * Masking is applied regardless of the `enabled` flag; use
   * {@link maskDocument} for the gated entry point.
   */
  maskObject(root: JsonObject, stats: MaskingStats = createStats()): MaskingStats {
    this.walkObject(root, this.current, stats);
    return stats;
  }

  /**
   * Mask a JSON document.
   *
   * Returns the input unchanged when masking is disabled, the input is
   * blank, the JSON is malformed, or the root is not an object. Output
   * is compact JSON; whitespace from the input is not preserved.
   */
  maskDocument(text: string, stats: MaskingStats = createStats()): string {
    const config = this.current;
    if (!config.enabled || text.trim().length === 0) return text;

    let root: unknown;
    try {
      root = parse(text);
    } catch (err) {
      return this.failOpen(
        config,
        text,
        new MaskingError("invalid-json", `Invalid JSON: ${errorMessage(err)}`, { cause: err }),
      );
    }

    if (!isDocumentObject(root)) {
      return this.failOpen(
        config,
        text,
        new MaskingError("unsupported-root", `Unsupported document root: ${describeRoot(root)}`),
      );
    }

    try {
      this.walkObject(root, config, stats);
      const output = stringify(root);
      if (output === undefined) throw new Error("document serialized to nothing");
      return output;
    } catch (err) {
      return this.failOpen(
        config,
        text,
        new MaskingError("internal", `Data masking failed: ${errorMessage(err)}`, { cause: err }),
      );
    }
  }

  // --- Private ---

  private applyFor(fieldName: string, value: string | null): string | null {
    if (value === null) return null;
    const strategy = this.findStrategy(fieldName);
    return strategy ? strategy.apply(value) : value;
  }

  private failOpen(config: MaskingConfig, text: string, error: MaskingError): string {
    if (config.failClosed) throw error;
    // Non-object roots are a supported no-op, not a failure worth logging
    if (error.reason !== "unsupported-root") {
      this.logger.error("Returning document unmasked", error);
    }
    return text;
  }

  private walkObject(
    node: Record<string, unknown>,
    config: MaskingConfig,
    stats: MaskingStats,
  ): void {
    for (const [key, child] of Object.entries(node)) {
      if (typeof child === "string") {
        if (!isAllowed(config.fields, key)) continue;
        const strategy = config.registry.find(key);
        if (!strategy) continue;
        node[key] = strategy.apply(child);
        stats.totalMasked++;
        stats.byStrategy[strategy.name] = (stats.byStrategy[strategy.name] ?? 0) + 1;
      } else {
        this.walkChild(child, config, stats);
      }
    }
  }

  /** Recurse into containers. Scalars inside arrays are never masked. */
  private walkChild(value: unknown, config: MaskingConfig, stats: MaskingStats): void {
    if (Array.isArray(value)) {
      for (const item of value) this.walkChild(item, config, stats);
    } else if (isDocumentObject(value)) {
      this.walkObject(value, config, stats);
    }
  }
}

/** A JSON object node: not an array, not null, not a parsed number. */
function isDocumentObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !isLosslessNumber(value)
  );
}

function describeRoot(root: unknown): string {
  if (Array.isArray(root)) return "array";
  if (root === null) return "null";
  if (isLosslessNumber(root)) return "number";
  return typeof root;
}
