/**
 * Text Utilities
 */

/**
 * Lowercased word tokens (letters and digits)
 */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
}
