/**
 * Normalize a proposed good name: trim it, upper-case the first character
 * and lower-case the rest ("  diana PRINCE " → "Diana prince").
 *
 * When upper-casing the first character yields several characters
 * ("ß" → "SS") only the first of them stays upper-case, which keeps the
 * function idempotent.
 */
export function normalizeName(text: string): string {
  const [first, ...rest] = Array.from(text.trim());
  if (first === undefined) return "";

  const [head = "", ...overflow] = Array.from(first.toUpperCase());
  return head + [...overflow, ...rest].join("").toLowerCase();
}
