/**
 * Word-level timing recovered from the rendered speech. The cache stored on a
 * text is an ordered list indexed 1..N by word position.
 */
export interface WordTimestamp {
  word: string;
  start: number;
  end: number;
}

export interface AlignmentCache {
  words: WordTimestamp[];
  alignedAt: Date;
}

/** Words as an alignment engine heard them; may skip, merge or add words. */
export type RecognizedWord = WordTimestamp;
