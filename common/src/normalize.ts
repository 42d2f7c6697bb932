const REMOVED_CHARACTERS_PATTERN = /[.()]/g;
const MULTIPLE_SPACE_PATTERN = /\s+/g;
// Taggers tend to leave list punctuation attached to the ends of tokens.
const EDGE_PUNCTUATION_PATTERN = /^[\s,;]+|[\s,;]+$/g;

/**
 * Canonicalize a single address component: uppercase, without periods or
 * parentheses (USPS Pub 28 §354), and with whitespace collapsed.
 *
 * @example
 * normalizeComponent("  Ste. ") // "STE"
 * normalizeComponent("New   york,") // "NEW YORK"
 */
export function normalizeComponent(value: string): string {
  return value
    .toUpperCase()
    .replace(REMOVED_CHARACTERS_PATTERN, "")
    .replace(MULTIPLE_SPACE_PATTERN, " ")
    .replace(EDGE_PUNCTUATION_PATTERN, "");
}
