import { describe, expect, it } from '@jest/globals';
import { buildTranscript, normalizeWord, tokenizeWords } from './word-tokenizer';

describe('word-tokenizer', () => {
  it('splits on any run of whitespace and drops empty tokens', () => {
    expect(tokenizeWords('  The storm,\n\tbroke   at dawn. ')).toEqual(['The', 'storm,', 'broke', 'at', 'dawn.']);
    expect(tokenizeWords('   ')).toEqual([]);
  });

  it('keeps punctuation attached so positions match the raw text', () => {
    expect(tokenizeWords("Don't stop!")).toEqual(["Don't", 'stop!']);
  });

  it('normalizes for matching only', () => {
    expect(normalizeWord('Thunder!')).toBe('thunder');
    expect(normalizeWord("Don't")).toBe('dont');
    expect(normalizeWord('Café')).toBe('café');
    expect(normalizeWord('--')).toBe('');
  });

  it('joins segments with one space in order', () => {
    expect(buildTranscript(['Hello there.', '  General Kenobi. ', '', 'Bye'])).toBe(
      'Hello there. General Kenobi. Bye'
    );
  });

  it('tokenizes joined segments the same as the text they partition', () => {
    const content = 'It was late.\nThunder rolled over the hills.  "Run," she said.';
    const segments = ['It was late.', 'Thunder rolled over the hills.', '"Run," she said.'];
    expect(tokenizeWords(buildTranscript(segments))).toEqual(tokenizeWords(content));
    expect(tokenizeWords(content)).toHaveLength(11);
  });
});
