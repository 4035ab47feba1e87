// ---------------------------------------------------------------------------
// Token counting for cost previews.
// Billed cost always comes from the usage the service reports; this estimate
// only feeds pre-flight projections.
// ---------------------------------------------------------------------------

export interface Tokenizer {
  count(text: string): number;
}

/** Average characters per token for Claude models on mixed text. */
export const CHARS_PER_TOKEN = 3.5;

export const approximateTokenizer: Tokenizer = {
  count(text: string): number {
    if (text.length === 0) return 0;
    // Count code points so Vietnamese diacritics are not double-counted.
    return Math.ceil([...text].length / CHARS_PER_TOKEN);
  },
};
