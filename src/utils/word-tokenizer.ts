/**
 * One tokenization shared by alignment and effect placement: word position k
 * (1-based) always refers to tokenizeWords(transcript)[k - 1].
 */

export function tokenizeWords(text: string): string[] {
  return text.split(/\s+/).filter((token) => token.length > 0);
}

/** Matching key only; never used for indexing. */
export function normalizeWord(word: string): string {
  return word.toLowerCase().replace(/[^\p{L}\p{N}]/gu, '');
}

/** Segment texts in playback order, joined with a single space. */
export function buildTranscript(segmentTexts: string[]): string {
  return segmentTexts
    .map((text) => text.trim())
    .filter((text) => text.length > 0)
    .join(' ');
}
