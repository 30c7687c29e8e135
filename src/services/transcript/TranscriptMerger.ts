export interface MergeResult {
  merged: string;
  newText: string;
}

const MAX_OVERLAP_TOKENS = 10;
const ELLIPSIS = '...';
const CLOSING_PUNCTUATION = '.!?;:,)]}';

const isAlphabetic = (char: string): boolean => /\p{L}/u.test(char);
const isAlphanumeric = (char: string): boolean => /[\p{L}\p{N}]/u.test(char);

/** Whitespace-separated tokens; punctuation stays attached to its word. */
export const tokenize = (text: string): string[] => text.trim().split(/\s+/).filter(Boolean);

/**
 * Size of the longest suffix of `previous` equal to a prefix of `current`,
 * searched from the largest candidate down so the longest match wins.
 */
export const findTokenOverlap = (
  previous: string[],
  current: string[],
  maxOverlap = MAX_OVERLAP_TOKENS
): number => {
  const limit = Math.min(maxOverlap, previous.length, current.length);

  for (let size = limit; size >= 1; size -= 1) {
    const offset = previous.length - size;
    let matches = true;

    for (let index = 0; index < size; index += 1) {
      if (previous[offset + index] !== current[index]) {
        matches = false;
        break;
      }
    }

    if (matches) {
      return size;
    }
  }

  return 0;
};

/**
 * Appends a chunk transcript to the running transcript, dropping words the
 * overlapping audio made the backend repeat. `newText` is the part that was
 * actually added.
 */
export const mergeTranscripts = (previous: string, current: string): MergeResult => {
  if (!previous) {
    return { merged: current, newText: current };
  }

  if (!current.trim()) {
    return { merged: previous, newText: '' };
  }

  // A pause transcribed as "..." on both sides of the boundary.
  if (previous.trimEnd().endsWith(ELLIPSIS) && current.trimStart().startsWith(ELLIPSIS)) {
    const remainder = current.trimStart().replace(/^\.+/, '').trimStart();
    if (!remainder) {
      return { merged: previous, newText: '' };
    }

    return { merged: `${previous} ${remainder}`, newText: remainder };
  }

  const currentTokens = tokenize(current);
  const overlap = findTokenOverlap(tokenize(previous), currentTokens);
  if (overlap === 0) {
    return { merged: `${previous} ${current}`, newText: current };
  }

  const remaining = currentTokens.slice(overlap);
  if (remaining.length === 0) {
    return { merged: previous, newText: '' };
  }

  const newText = remaining.join(' ');
  return { merged: `${previous} ${newText}`, newText };
};

export const cleanTranscript = (text: string): string => {
  if (!text) {
    return '';
  }

  return text
    .trim()
    .replace(/\s+/g, ' ')
    .replace(/\s+([.,!?;:])/g, '$1')
    .replace(/([.,!?;:])([A-Za-z])/g, '$1 $2');
};

/**
 * Forces a leading space on `fragment` when typing it straight after
 * `preceding` would glue two words together ("word.Next", "wordnext").
 */
export const ensureSpaceBefore = (preceding: string, fragment: string): string => {
  if (!preceding || !fragment) {
    return fragment;
  }

  const lastChar = preceding.trimEnd().slice(-1);
  const firstChar = fragment.trimStart().charAt(0);
  if (!lastChar || !firstChar) {
    return fragment;
  }

  if (CLOSING_PUNCTUATION.includes(lastChar) && isAlphabetic(firstChar)) {
    return ` ${fragment.trimStart()}`;
  }

  if (isAlphanumeric(lastChar) && isAlphanumeric(firstChar)) {
    return ` ${fragment.trimStart()}`;
  }

  return fragment;
};

/**
 * Merge step used by the session: dedupe against the running transcript, then
 * clean the fragment and space it for output after the text already emitted.
 */
export const mergeChunkText = (previous: string, rawChunk: string): MergeResult => {
  const { merged, newText } = mergeTranscripts(previous, rawChunk);
  const cleaned = cleanTranscript(newText);

  return {
    merged,
    newText: cleaned ? ensureSpaceBefore(previous, cleaned) : ''
  };
};
