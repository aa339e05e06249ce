/**
 * Field allowlist.
 *
 * The allowlist answers "is this field in scope at all". It is checked
 * independently of strategy matching: a field is masked only when it is
 * allowlisted AND a strategy matches it.
 */

/** Field names considered when no explicit list is configured. */
export const DEFAULT_FIELDS: readonly string[] = Object.freeze([
  "name",
  "phone",
  "phonenumber",
  "phone_number",
  "email",
  "emailaddress",
  "email_address",
]);

export function normalizeFieldName(fieldName: string): string {
  return fieldName.trim().toLowerCase();
}

/**
 * Parse a comma-separated field list.
 * "Name, Email ,,iban" -> ["name", "email", "iban"]
 */
export function parseFieldList(csv: string): string[] {
  return csv
    .split(",")
    .map(normalizeFieldName)
    .filter((f) => f.length > 0);
}

/**
 * Build a normalized allowlist.
 *
 * A non-empty list replaces the defaults entirely; it is never merged
 * with them. An absent list, or one with only blank entries, selects
 * {@link DEFAULT_FIELDS}.
 */
export function createAllowlist(
  fields?: string | Iterable<string> | null,
): ReadonlySet<string> {
  const names =
    typeof fields === "string"
      ? parseFieldList(fields)
      : [...(fields ?? [])].map(normalizeFieldName).filter((f) => f.length > 0);

  return new Set(names.length > 0 ? names : DEFAULT_FIELDS);
}

export function isAllowed(allowlist: ReadonlySet<string>, fieldName: string): boolean {
  return allowlist.has(normalizeFieldName(fieldName));
}
