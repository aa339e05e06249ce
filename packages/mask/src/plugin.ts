/**
 * Exchange plugin that masks payloads crossing the boundary.
 */

import { isJsonObject } from "@datamask/core";
import type { ExchangePlugin, RequestContext, ResponseContext } from "@datamask/core";

import { loadConfigFile, resolveMaskingOptions } from "./config.js";
import { MaskingEngine, MaskingError, createStats, describeConfig } from "./engine.js";
import type { MaskingOptions, MaskingStats } from "./engine.js";
import { consoleLogger, errorMessage } from "./log.js";
import type { MaskLogger } from "./log.js";

/** Configuration for {@link createMaskingPlugin}. */
export interface MaskingPluginConfig extends MaskingOptions {
  /** Path to a config JSON(C) file. Explicit options in this object win over it. */
  configFile?: string;
  /** Pre-built engine. Overrides every other option. */
  engine?: MaskingEngine;
  /** Log per-hook mask counts. */
  verbose?: boolean;
  logger?: MaskLogger;
}

/** Resolve effective engine: explicit engine > options over config file > env > defaults. */
function resolveEngine(config: MaskingPluginConfig | undefined, logger: MaskLogger): MaskingEngine {
  if (config?.engine) return config.engine;
  const fromFile = config?.configFile ? loadConfigFile(config.configFile) : {};
  const options = resolveMaskingOptions({
    enabled: config?.enabled ?? fromFile.enabled,
    fields: config?.fields ?? fromFile.fields,
    strategies: config?.strategies ?? fromFile.strategies,
    failClosed: config?.failClosed ?? fromFile.failClosed,
  });
  return new MaskingEngine({ ...options, logger });
}

function formatStats(stats: MaskingStats): string {
  return Object.entries(stats.byStrategy)
    .map(([name, count]) => `${name}=${count}`)
    .join(", ");
}

/**
 * Create a masking plugin.
 *
 * onRequest masks JSON object bodies; onResponse masks non-streaming
 * text bodies. The caller's request body is never mutated: the plugin
 * works on a copy and returns a new context when something changed.
 *
 * Fail-closed engines reject the hook with a {@link MaskingError}, so
 * the host drops the exchange instead of forwarding an unmasked
 * payload. Fail-open engines forward the payload as received.
 *
 * ```typescript
 * import { createMaskingPlugin } from '@datamask/mask';
 *
 * const mask = createMaskingPlugin({ fields: "name,email,iban", verbose: true });
 * ```
 */
export function createMaskingPlugin(config?: MaskingPluginConfig): ExchangePlugin {
  const logger = config?.logger ?? consoleLogger;
  const verbose = config?.verbose ?? false;
  const engine = resolveEngine(config, logger);

  if (verbose) logger.info(describeConfig(engine.config));

  function report(direction: string, sessionId: string | null, stats: MaskingStats): void {
    if (!verbose || stats.totalMasked === 0) return;
    const sid = sessionId ? ` [${sessionId}]` : "";
    logger.info(`${direction}${sid} Masked ${stats.totalMasked} field(s): ${formatStats(stats)}`);
  }

  return {
    name: "mask",

    onRequest(ctx: RequestContext): RequestContext {
      if (!engine.config.enabled || !isJsonObject(ctx.body)) return ctx;

      const body = structuredClone(ctx.body);
      let stats: MaskingStats;
      try {
        stats = engine.maskObject(body);
      } catch (err) {
        const error = new MaskingError("internal", `Data masking failed: ${errorMessage(err)}`, {
          cause: err,
        });
        if (engine.config.failClosed) {
          logger.error("Rejecting request", error);
          throw error;
        }
        logger.error("Forwarding request unmasked", error);
        return ctx;
      }
      report("request", ctx.sessionId, stats);

      return stats.totalMasked > 0 ? { ...ctx, body } : ctx;
    },

    onResponse(ctx: ResponseContext): ResponseContext {
      if (ctx.isStreaming) return ctx;

      const stats = createStats();
      let body: string;
      try {
        // Only throws when the engine is fail-closed
        body = engine.maskDocument(ctx.body, stats);
      } catch (err) {
        logger.error("Rejecting response", err);
        throw err;
      }
      report("response", ctx.sessionId, stats);

      // Unmasked documents keep their original formatting
      return stats.totalMasked > 0 ? { ...ctx, body } : ctx;
    },
  };
}
