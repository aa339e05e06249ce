/**
 * Configuration for @datamask/mask.
 *
 * Two sources feed the engine: environment variables (merged with
 * programmatic overrides) and an optional JSON(C) config file.
 *
 * Config file format:
 * {
 *   "enabled": true,
 *   "fields": ["name", "email", "iban"],   // or "name,email,iban"
 *   "failClosed": false,
 *   "strategies": ["account"],             // opt-in built-ins
 *   "rules": [                             // custom trailing-digit rules
 *     { "id": "tax-id", "match": "(?i)^tax_?id$", "keep": 2 }
 *   ]
 * }
 *
 * Opt-in strategies and custom rules are appended after the defaults
 * (name, email, phone), in file order.
 */

import fs from "node:fs";

import { z } from "zod";

import { parseFieldList } from "./allowlist.js";
import type { MaskingOptions } from "./engine.js";
import {
  DEFAULT_STRATEGIES,
  OPTIONAL_STRATEGIES,
  OPTIONAL_STRATEGY_NAMES,
  trailingDigitsStrategy,
} from "./strategies.js";
import type { MaskingStrategy } from "./strategies.js";

// --- Environment ---

const FALSE_VALUES = new Set(["false", "0", "no", "off"]);
const TRUE_VALUES = new Set(["true", "1", "yes", "on"]);

function readFlag(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const v = value.trim().toLowerCase();
  if (FALSE_VALUES.has(v)) return false;
  if (TRUE_VALUES.has(v)) return true;
  return undefined;
}

/**
 * Resolve engine options from environment variables and overrides.
 *
 * Priority: programmatic overrides > environment variables > defaults.
 *
 * Environment variables:
 * - `DATAMASK_ENABLED`: "false", "0", "no" or "off" disables masking (default: enabled)
 * - `DATAMASK_FIELDS`: comma-separated field names (default: built-in set)
 * - `DATAMASK_FAIL_CLOSED=1` to reject malformed documents instead of passing them through
 */
export function resolveMaskingOptions(
  overrides?: MaskingOptions,
  env: NodeJS.ProcessEnv = process.env,
): MaskingOptions {
  const enabled = overrides?.enabled ?? readFlag(env.DATAMASK_ENABLED) ?? true;

  const fields =
    overrides?.fields ??
    (env.DATAMASK_FIELDS ? parseFieldList(env.DATAMASK_FIELDS) : null);

  const failClosed =
    overrides?.failClosed ?? readFlag(env.DATAMASK_FAIL_CLOSED) ?? false;

  return {
    enabled,
    fields,
    failClosed,
    strategies: overrides?.strategies ?? DEFAULT_STRATEGIES,
  };
}

// --- Config file schema ---

const ruleSchema = z.object({
  id: z.string().min(1),
  match: z.string().min(1),
  keep: z.number().int().min(0).optional(),
});

export const maskConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
    fields: z.union([z.string(), z.array(z.string())]).optional(),
    failClosed: z.boolean().optional(),
    strategies: z.array(z.enum(OPTIONAL_STRATEGY_NAMES)).optional(),
    rules: z.array(ruleSchema).optional(),
  })
  .strict();

export type MaskConfigJson = z.infer<typeof maskConfigSchema>;
export type MaskRuleJson = z.infer<typeof ruleSchema>;

// --- Compilation ---

/**
 * Strip // comments and trailing commas from JSON-with-comments.
 * Text inside string literals is copied as is, so a pattern such as
 * "a,]" or "https?://" survives.
 */
function stripJsonComments(text: string): string {
  let result = "";
  let inString = false;
  // Index in `result` of a comma that may turn out to be trailing
  let comma = -1;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      result += ch;
      if (ch === "\\") {
        result += text.charAt(i + 1);
        i++;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === "/" && text[i + 1] === "/") {
      const eol = text.indexOf("\n", i);
      if (eol === -1) break;
      i = eol - 1;
      continue;
    }

    if ((ch === "]" || ch === "}") && comma !== -1) {
      result = result.slice(0, comma) + result.slice(comma + 1);
    }
    if (ch === ",") {
      comma = result.length;
    } else if (!/\s/.test(ch)) {
      comma = -1;
    }
    if (ch === '"') inString = true;
    result += ch;
  }

  return result;
}

/**
 * Compile a custom rule into a trailing-digits strategy.
 *
 * Patterns may start with (?i), which is accepted for compatibility
 * but redundant: field matching is always case-insensitive.
 */
function compileRule(rule: MaskRuleJson): MaskingStrategy {
  const source = rule.match.startsWith("(?i)") ? rule.match.slice(4) : rule.match;
  let pattern: RegExp;
  try {
    pattern = new RegExp(source, "i");
  } catch (err) {
    throw new Error(
      `Invalid pattern for rule "${rule.id}": ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return trailingDigitsStrategy({ name: rule.id, match: pattern, keep: rule.keep });
}

/**
 * Turn validated config JSON into engine options.
 */
export function compileConfig(json: MaskConfigJson): MaskingOptions {
  const strategies: MaskingStrategy[] = [...DEFAULT_STRATEGIES];
  for (const name of json.strategies ?? []) {
    strategies.push(OPTIONAL_STRATEGIES[name]);
  }
  for (const rule of json.rules ?? []) {
    strategies.push(compileRule(rule));
  }

  return {
    enabled: json.enabled,
    fields: typeof json.fields === "string" ? parseFieldList(json.fields) : json.fields,
    failClosed: json.failClosed,
    strategies,
  };
}

/**
 * Parse and validate config text. `source` names the origin in errors.
 */
export function parseConfig(text: string, source = "config"): MaskingOptions {
  let raw: unknown;
  try {
    raw = JSON.parse(stripJsonComments(text));
  } catch (err) {
    throw new Error(
      `${source}: invalid JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  const parsed = maskConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? ` at "${issue.path.join(".")}"` : "";
    throw new Error(`${source}: ${issue.message}${where}`);
  }

  return compileConfig(parsed.data);
}

/**
 * Load engine options from a JSON file. Supports // comments and trailing commas.
 */
export function loadConfigFile(filePath: string): MaskingOptions {
  const raw = fs.readFileSync(filePath, "utf8");
  return parseConfig(raw, filePath);
}
