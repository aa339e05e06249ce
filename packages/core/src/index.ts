/**
 * @datamask/core
 *
 * Shared types for the datamask packages. This is the contract layer:
 * every other `@datamask/*` package depends on it.
 *
 * Zero npm dependencies. Just types and a type guard.
 *
 * @packageDocumentation
 */

export { isJsonObject } from "./types.js";

export type {
  ExchangePlugin,
  HeaderMap,
  JsonObject,
  JsonPrimitive,
  JsonValue,
  RequestContext,
  ResponseContext,
  TransformerContext,
} from "./types.js";
