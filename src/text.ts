/**
 * Canonicalizes free text for matching.
 *
 * - `null`/`undefined`/non-strings become `""`
 * - lowercased and trimmed
 * - combining diacritical marks removed ("hipertensión" -> "hipertension")
 */
export function normalizeText(text: unknown): string {
  if (typeof text !== "string") return "";

  // Trim last: a stray leading mark would otherwise shield whitespace.
  return text
    .toLowerCase()
    .normalize("NFD")
    .replace(/\p{Mn}/gu, "")
    .trim();
}
