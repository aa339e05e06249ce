/**
 * Masking strategies.
 *
 * A strategy is the atomic unit of the masking engine. It pairs a
 * field-name test ("does this rule apply to `customerEmail`?") with a
 * value transform ("how is the value redacted?"). Strategies are pure:
 * the same input always produces the same output.
 *
 * New rules are added by appending a strategy to the engine's list,
 * never by teaching the engine about specific field names.
 */

export const MASK_CHAR = "*";

export interface MaskingStrategy {
  /** Identifier for logging and stats. */
  readonly name: string;
  /** Case-insensitive test against a field name. */
  matches(fieldName: string): boolean;
  /** Redact a value. `null` passes through unchanged. */
  apply(value: string): string;
  apply(value: string | null): string | null;
}

export interface StrategyDefinition {
  name: string;
  /**
   * Field-name test. A string is a case-insensitive substring match,
   * so "email" matches "contactEmail". A RegExp is tested against the
   * field name with the "i" flag added.
   */
  match: string | RegExp;
  /** Mask a non-null value. */
  mask: (value: string) => string;
}

function compileMatcher(match: string | RegExp): (fieldName: string) => boolean {
  if (typeof match === "string") {
    const needle = match.toLowerCase();
    return (fieldName) => fieldName.toLowerCase().includes(needle);
  }
  // Drop "g"/"y" so test() carries no lastIndex state between calls
  const flags = match.flags.replace(/[gy]/g, "");
  const pattern = new RegExp(match.source, flags.includes("i") ? flags : flags + "i");
  return (fieldName) => pattern.test(fieldName);
}

/**
 * Build a strategy from a field matcher and a mask function.
 *
 * ```typescript
 * const ssn = defineStrategy({
 *   name: "ssn",
 *   match: /^(ssn|social_security)$/,
 *   mask: () => "***-**-****",
 * });
 * ```
 */
export function defineStrategy(definition: StrategyDefinition): MaskingStrategy {
  const matches = compileMatcher(definition.match);
  const mask = definition.mask;

  function apply(value: string): string;
  function apply(value: string | null): string | null;
  function apply(value: string | null): string | null {
    return value === null ? null : mask(value);
  }

  return { name: definition.name, matches, apply };
}

// --- Built-in mask functions ---

function maskTail(chars: string[]): string {
  return chars.length > 0 ? chars[0] + MASK_CHAR.repeat(chars.length - 1) : "";
}

/** "John Smith" -> "J*** S****" */
export function maskName(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length === 0) return value;
  return trimmed
    .split(/\s+/)
    .filter((part) => part.length > 0)
    .map((part) => maskTail(Array.from(part)))
    .join(" ");
}

/** "test@example.com" -> "t***@example.com" */
export function maskEmail(value: string): string {
  const at = value.indexOf("@");
  if (at === -1) return value;
  const local = Array.from(value.slice(0, at));
  // A one-character local part leaves nothing to hide
  if (local.length < 2) return value;
  return maskTail(local) + value.slice(at);
}

/**
 * Mask every digit except the trailing `keep` characters. Separators
 * such as "-", " " or "(" pass through so the shape survives.
 * Values no longer than `keep` are returned unchanged.
 */
export function maskDigitsKeepingLast(value: string, keep: number): string {
  const chars = Array.from(value);
  if (chars.length <= keep) return value;
  const cut = chars.length - keep;
  let result = "";
  for (let i = 0; i < cut; i++) {
    result += /\p{Nd}/u.test(chars[i]) ? MASK_CHAR : chars[i];
  }
  return result + chars.slice(cut).join("");
}

/** "123-456-7890" -> "***-***-*890" */
export function maskPhoneNumber(value: string): string {
  return maskDigitsKeepingLast(value, 3);
}

// --- Built-in strategies ---

export const nameStrategy = defineStrategy({
  name: "name",
  match: "name",
  mask: maskName,
});

export const emailStrategy = defineStrategy({
  name: "email",
  match: "email",
  mask: maskEmail,
});

export const phoneStrategy = defineStrategy({
  name: "phone",
  match: "phone",
  mask: maskPhoneNumber,
});

export interface TrailingDigitsOptions {
  name: string;
  match: string | RegExp;
  /** Characters kept verbatim at the end of the value. Default: 4. */
  keep?: number;
}

/**
 * Generic numeric masking for account, card or IBAN style values.
 * Short values (length <= keep) pass through, as with phone numbers.
 */
export function trailingDigitsStrategy(options: TrailingDigitsOptions): MaskingStrategy {
  const keep = options.keep ?? 4;
  if (!Number.isInteger(keep) || keep < 0) {
    throw new Error(`Invalid keep count for strategy "${options.name}": ${keep}`);
  }
  return defineStrategy({
    name: options.name,
    match: options.match,
    mask: (value) => maskDigitsKeepingLast(value, keep),
  });
}

/** Opt-in strategy for account, IBAN and card numbers. Keeps the last 4. */
export const accountNumberStrategy = trailingDigitsStrategy({
  name: "account",
  match: /account|iban|card/,
  keep: 4,
});

/**
 * Strategies the engine uses when none are configured.
 * Order matters: the first strategy whose `matches` is true wins.
 */
export const DEFAULT_STRATEGIES: readonly MaskingStrategy[] = Object.freeze([
  nameStrategy,
  emailStrategy,
  phoneStrategy,
]);

export const OPTIONAL_STRATEGY_NAMES = ["account"] as const;
export type OptionalStrategyName = (typeof OPTIONAL_STRATEGY_NAMES)[number];

/** Opt-in strategies that config files can enable by name. */
export const OPTIONAL_STRATEGIES: Readonly<Record<OptionalStrategyName, MaskingStrategy>> = {
  account: accountNumberStrategy,
};
