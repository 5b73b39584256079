import { NamingError } from "./errors";

/**
 * Abbreviate column names into a short token for output filenames
 *
 * Takes the fewest leading characters that keep every name distinct
 * (case-insensitively), title-cases each prefix and joins them in order.
 *
 * @throws NamingError if the set is empty or no prefix length up to the
 *   shortest name separates every name
 *
 * @example
 * abbreviateNames(["grade", "gpa", "rank"]) // "GrGpRa"
 * abbreviateNames(["score"]) // "S"
 */
export function abbreviateNames(names: readonly string[]): string {
  if (names.length === 0) {
    throw new NamingError("Cannot abbreviate an empty set of column names");
  }

  const shortest = Math.min(...names.map((name) => name.length));

  for (let length = 1; length <= shortest; length++) {
    const prefixes = names.map((name) => name.slice(0, length).toLowerCase());
    if (new Set(prefixes).size === names.length) {
      return prefixes.map(titleCase).join("");
    }
  }

  throw new NamingError(
    `Cannot abbreviate column names without collisions: ${names.join(", ")}`,
  );
}

function titleCase(prefix: string): string {
  return prefix.charAt(0).toUpperCase() + prefix.slice(1);
}
