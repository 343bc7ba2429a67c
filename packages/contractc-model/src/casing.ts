// Naming helpers for exposed field and argument names.

/** Remove the raw identifier prefix: `r#type` becomes `type`. */
export function unraw(ident: string): string {
  return ident.startsWith("r#") ? ident.slice(2) : ident;
}

/**
 * Convert a snake_case identifier to camelCase.
 *
 * Only a leading `__` survives, so that reserved names stay reserved; any
 * other leading or repeated underscores are dropped.
 * `home_planet` -> `homePlanet`, `_private` -> `private`, `__type_name` -> `__typeName`.
 */
export function toCamelCase(ident: string): string {
  const reserved = ident.startsWith(RESERVED_PREFIX);
  const parts = (reserved ? ident.slice(RESERVED_PREFIX.length) : ident).split("_").filter(Boolean);
  const converted = parts
    .map((part, i) => (i === 0 ? part : part.charAt(0).toUpperCase() + part.slice(1)))
    .join("");
  return reserved ? RESERVED_PREFIX + converted : converted;
}

/** Names starting with this prefix are reserved for introspection. */
export const RESERVED_PREFIX = "__";

export function isReservedName(name: string): boolean {
  return name.startsWith(RESERVED_PREFIX);
}
