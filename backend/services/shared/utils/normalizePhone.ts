// backend/services/shared/utils/normalizePhone.ts

/**
 * Reduce a phone number in any format to its digits.
 *
 *   "+7 (999) 123-45-67" → "79991234567"
 *   "---+++((()))"       → ""
 *
 * Letters and punctuation are dropped, not transliterated.
 */
export function normalizePhone(input: string): string {
  if (!input) return "";
  return input.replace(/\D+/g, "");
}
