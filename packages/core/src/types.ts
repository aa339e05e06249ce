/**
 * Core types for the datamask packages.
 *
 * These are the public types that plugins and consumers depend on.
 * Zero external dependencies.
 */

// --- JSON document model ---

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonObject | JsonValue[];
export type JsonObject = { [key: string]: JsonValue };

export type HeaderMap = Record<string, string | string[] | undefined>;

/** Narrow a JSON value to a (non-array) object. */
export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

// --- Transformer context ---

/**
 * Handed to a transform by the pipeline that invoked it.
 *
 * A transform that cannot produce output reports why through
 * `reportProblem` and returns null, so callers can tell a failure
 * apart from a transform that simply changed nothing.
 */
export interface TransformerContext {
  reportProblem(message: string): void;
}

// --- Plugin system ---

/**
 * Context passed to onRequest hooks.
 *
 * Plugins can modify `headers` and `body` to transform an outbound
 * payload before it crosses the exchange boundary.
 */
export interface RequestContext {
  path: string;
  sessionId: string | null;
  headers: HeaderMap;
  body: JsonValue | null;
}

/**
 * Context passed to onResponse hooks.
 *
 * Plugins can modify `body` to transform the response before it is
 * sent back to the client. Only available for non-streaming responses.
 */
export interface ResponseContext {
  status: number;
  headers: HeaderMap;
  body: string;
  isStreaming: boolean;
  sessionId: string | null;
}

/**
 * An exchange plugin.
 *
 * Plugins run in array order. Request hooks form a pipeline: each
 * receives the output of the previous one.
 */
export interface ExchangePlugin {
  name: string;

  /**
   * Transform the request before it leaves the system.
   * Return the (possibly modified) context. Runs in pipeline order.
   */
  onRequest?: (ctx: RequestContext) => RequestContext | Promise<RequestContext>;

  /**
   * Transform the response before sending back to the client.
   * Only called for non-streaming responses.
   */
  onResponse?: (
    ctx: ResponseContext,
  ) => ResponseContext | Promise<ResponseContext>;
}
