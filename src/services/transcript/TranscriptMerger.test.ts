import * as fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import {
  cleanTranscript,
  ensureSpaceBefore,
  findTokenOverlap,
  mergeChunkText,
  mergeTranscripts,
  tokenize
} from './TranscriptMerger';

const textFrom = (alphabet: string[]): fc.Arbitrary<string> =>
  fc.array(fc.constantFrom(...alphabet), { maxLength: 30 }).map((parts) => parts.join(''));

const transcriptText = fc.oneof(
  fc.string(),
  textFrom([' ', '  ', '\t', '\n', 'a', 'b', 'c', '.']),
  textFrom(['.', ',', '!', '?', ';', ':', '...', ' ']),
  textFrom(['hello', 'world', 'again', '...', ' ', '.'])
);

describe('mergeTranscripts', () => {
  it('returns the other side unchanged when either side is empty', () => {
    fc.assert(
      fc.property(fc.string(), (text) => {
        expect(mergeTranscripts('', text)).toEqual({ merged: text, newText: text });
        expect(mergeTranscripts(text, '')).toEqual({ merged: text, newText: '' });
      })
    );
  });

  it('drops words repeated across the chunk boundary', () => {
    expect(mergeTranscripts('Hello world', 'world how are')).toEqual({
      merged: 'Hello world how are',
      newText: 'how are'
    });
  });

  it('concatenates with a space when nothing overlaps', () => {
    expect(mergeTranscripts('Complete sentence.', 'New sentence.')).toEqual({
      merged: 'Complete sentence. New sentence.',
      newText: 'New sentence.'
    });
  });

  it('joins a pause transcribed on both sides with a single ellipsis', () => {
    const result = mergeTranscripts('Um...', '...I think');

    expect(result).toEqual({ merged: 'Um... I think', newText: 'I think' });
    expect(result.merged.split('...')).toHaveLength(2);
  });

  it('adds nothing when the new chunk is only an ellipsis', () => {
    expect(mergeTranscripts('Um...', '...')).toEqual({ merged: 'Um...', newText: '' });
  });

  it('adds nothing when the new chunk repeats the tail entirely', () => {
    expect(mergeTranscripts('so we went home', 'went home')).toEqual({
      merged: 'so we went home',
      newText: ''
    });
  });

  it('prefers the longest overlap', () => {
    expect(mergeTranscripts('the cat the cat', 'the cat the cat sat')).toEqual({
      merged: 'the cat the cat sat',
      newText: 'sat'
    });
  });

  it('treats punctuation as part of the token', () => {
    expect(mergeTranscripts('I said hello.', 'hello there')).toEqual({
      merged: 'I said hello. hello there',
      newText: 'hello there'
    });
  });
});

describe('findTokenOverlap', () => {
  it('returns the size of the longest suffix/prefix match', () => {
    expect(findTokenOverlap(['a', 'b', 'a', 'b'], ['a', 'b', 'a', 'c'])).toBe(2);
    expect(findTokenOverlap(['a'], ['b'])).toBe(0);
    expect(findTokenOverlap([], ['a'])).toBe(0);
  });

  it('looks at most ten tokens back by default', () => {
    const previous = tokenize('t1 t2 t3 t4 t5 t6 t7 t8 t9 t10 t11');
    const current = [...previous, 'next'];

    expect(findTokenOverlap(previous, current)).toBe(0);
    expect(findTokenOverlap(previous, current, 11)).toBe(11);
  });
});

describe('cleanTranscript', () => {
  it('collapses whitespace and fixes spacing around punctuation', () => {
    expect(cleanTranscript('  hello   world , again.Next  ')).toBe('hello world, again. Next');
  });

  it('returns an empty string for empty input', () => {
    expect(cleanTranscript('')).toBe('');
    expect(cleanTranscript('   ')).toBe('');
  });
});

describe('ensureSpaceBefore', () => {
  it('separates a word from closing punctuation or another word', () => {
    expect(ensureSpaceBefore('Hello.', 'World')).toBe(' World');
    expect(ensureSpaceBefore('hello', 'world')).toBe(' world');
    expect(ensureSpaceBefore('take 5', '  more')).toBe(' more');
  });

  it('leaves fragments that already attach correctly', () => {
    expect(ensureSpaceBefore('Hello', ', there')).toBe(', there');
    expect(ensureSpaceBefore('', 'start')).toBe('start');
    expect(ensureSpaceBefore('(', 'aside')).toBe('aside');
  });
});

describe('mergeChunkText', () => {
  it('cleans the new fragment and spaces it after the running transcript', () => {
    expect(mergeChunkText('Hello world', 'world  how are')).toEqual({
      merged: 'Hello world how are',
      newText: ' how are'
    });
  });

  it('emits the first chunk without a leading space', () => {
    expect(mergeChunkText('', 'hello there')).toEqual({ merged: 'hello there', newText: 'hello there' });
  });

  it('emits nothing for a fully repeated chunk', () => {
    expect(mergeChunkText('Hi there', 'there')).toEqual({ merged: 'Hi there', newText: '' });
  });

  it('always keeps the running transcript as the prefix of the merge', () => {
    fc.assert(
      fc.property(transcriptText, transcriptText, (previous, chunk) => {
        const result = mergeChunkText(previous, chunk);

        expect(result.merged.startsWith(previous)).toBe(true);
        expect(mergeTranscripts(previous, chunk).merged).toBe(result.merged);
      })
    );
  });

  it('adds nothing for a chunk of whitespace only', () => {
    fc.assert(
      fc.property(transcriptText, textFrom([' ', '\t', '\n']), (previous, chunk) => {
        expect(mergeChunkText(previous, chunk).newText).toBe('');
      })
    );
  });
});
