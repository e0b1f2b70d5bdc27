/**
 * Slug utilities
 *
 * Used in both directions:
 * - generating a filename slug from a post title (`daybook new`)
 * - deriving a display title from a filename slug
 *
 * Slug generation is deterministic:
 * - Unicode normalization (NFKC)
 * - Transliteration (diacritics to ASCII)
 * - Cleaning (spaces to dashes, punctuation removal)
 * - Length limiting with word boundary preservation
 */

const MAX_SLUG_LENGTH = 64;

/**
 * Letters that do not decompose into base + combining mark
 */
const LIGATURE_MAP: Record<string, string> = {
  Æ: "AE",
  æ: "ae",
  Œ: "OE",
  œ: "oe",
  Ø: "O",
  ø: "o",
  Ł: "L",
  ł: "l",
  Đ: "D",
  đ: "d",
  Ð: "D",
  ð: "d",
  Þ: "TH",
  þ: "th",
  ß: "ss",
  ı: "i",
};

/**
 * Normalize a string using Unicode NFKC normalization, trim and lowercase
 */
export function normalize(input: string): string {
  // NFKC: compatibility decomposition followed by canonical composition
  // (ligatures, full-width forms, etc.)
  return input.normalize("NFKC").trim().toLocaleLowerCase("en");
}

/**
 * Transliterate non-ASCII Latin characters to ASCII equivalents
 */
export function transliterate(input: string): string {
  let result = "";
  for (const char of input) {
    result += LIGATURE_MAP[char] ?? char;
  }

  // Split accented letters into base + mark, drop the marks, recompose
  return result.normalize("NFD").replace(/\p{M}+/gu, "").normalize("NFC");
}

/**
 * Clean a string by replacing spaces with dashes, removing punctuation, and collapsing dashes
 * Preserves Unicode letters and numbers
 */
export function clean(input: string): string {
  return input
    .replace(/[\s_]+/g, "-")
    .replace(/[^\p{L}\p{N}-]/gu, "")
    .replace(/-+/g, "-")
    .replace(/^-+|-+$/g, "");
}

/**
 * Limit length while preserving word boundaries
 */
export function limitLength(input: string, maxLength: number): string {
  const effectiveMax = Math.max(1, maxLength);

  if (input.length <= effectiveMax) {
    return input;
  }

  const truncated = input.substring(0, effectiveMax);
  const lastDash = truncated.lastIndexOf("-");

  // Break at a dash in the last 40% of the string, otherwise hard truncate
  if (lastDash > effectiveMax * 0.6) {
    return truncated.substring(0, lastDash);
  }

  return truncated;
}

/**
 * Generate a slug from a post title
 *
 * @example generateSlug("Crème Brûlée, Explained") // "creme-brulee-explained"
 * @throws Error if nothing slug-worthy remains
 */
export function generateSlug(input: string): string {
  if (!input) {
    throw new Error("Input must be a non-empty string");
  }

  const slug = limitLength(clean(transliterate(normalize(input))), MAX_SLUG_LENGTH);

  if (!slug) {
    throw new Error(`Unable to generate slug from input: "${input}"`);
  }

  return slug;
}

/**
 * Turn a filename slug into a display title
 *
 * @example titleFromSlug("hello-world_again") // "Hello World Again"
 */
export function titleFromSlug(slug: string): string {
  return slug
    .split(/[-_]+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toLocaleUpperCase("en") + word.slice(1))
    .join(" ");
}
