/**
 * A stored criteria value is either a literal compared with `===` or a
 * delimited pattern such as `/^\/api\/.*$/i` applied as a regular expression.
 *
 * @module
 */

const REGEX_PATTERN = /^\/(.+)\/([a-z]*)$/i;

/**
 * Checks whether a value is written as a delimited regular expression.
 */
export function isRegexPattern(value: unknown): value is string {
  return typeof value === "string" && REGEX_PATTERN.test(value);
}

/**
 * Compiles a delimited pattern into a RegExp.
 * @returns The expression, or null when the pattern is not delimited or does not compile
 */
export function toRegExp(pattern: string): RegExp | null {
  const parts = REGEX_PATTERN.exec(pattern);
  if (!parts) {
    return null;
  }

  try {
    return new RegExp(parts[1], parts[2]);
  } catch {
    return null;
  }
}

/**
 * Checks whether a searched value satisfies a stored criteria value.
 *
 * @example
 * ```typescript
 * criteriaMatches("/^\\/api\\/.*$/", "/api/users"); // true
 * criteriaMatches("5", 5); // false
 * ```
 */
export function criteriaMatches(
  storedValue: unknown,
  searchValue: unknown,
): boolean {
  if (isRegexPattern(storedValue)) {
    const regex = toRegExp(storedValue);
    if (!regex) return false;

    switch (typeof searchValue) {
      case "string":
      case "number":
      case "boolean":
        return regex.test(String(searchValue));
      default:
        return false;
    }
  }

  return storedValue === searchValue;
}
