/**
 * Sentence and word break helpers shared by the detector, segmenter and synthesizer
 */

/**
 * Sentence terminator, optional closing quotes/brackets, then whitespace.
 * A blank line also ends a sentence.
 */
const SENTENCE_END_PATTERN = /[.!?…]+["'”’)\]]*\s+|\n[ \t]*\n\s*/g;

/**
 * Offsets where a new sentence starts, in (from, to]
 */
export function findSentenceEnds(text: string, from = 0, to = text.length): number[] {
  const ends: number[] = [];
  const pattern = new RegExp(SENTENCE_END_PATTERN.source, 'g');
  pattern.lastIndex = from;

  let match: RegExpExecArray | null;
  while ((match = pattern.exec(text)) !== null) {
    const end = match.index + match[0].length;
    if (end > to) break;
    if (end > from) ends.push(end);
  }

  return ends;
}

/**
 * Last sentence start in (from, limit], if any
 */
export function lastSentenceEnd(text: string, from: number, limit: number): number | undefined {
  const ends = findSentenceEnds(text, from, limit);
  return ends.length > 0 ? ends[ends.length - 1] : undefined;
}

/**
 * Last offset in (from, limit] that directly follows whitespace
 */
export function lastWordBreak(text: string, from: number, limit: number): number | undefined {
  for (let p = limit; p > from; p--) {
    if (/\s/.test(text.charAt(p - 1))) {
      return p;
    }
  }
  return undefined;
}

/**
 * Sentence start closest to target within +/- window.
 * Falls back to the closest word break, then to the target itself.
 */
export function nearestSentenceEnd(text: string, target: number, window: number): number {
  const from = Math.max(0, target - window);
  const to = Math.min(text.length, target + window);

  const closest = (candidates: number[]): number | undefined => {
    let best: number | undefined;
    for (const candidate of candidates) {
      if (best === undefined || Math.abs(candidate - target) < Math.abs(best - target)) {
        best = candidate;
      }
    }
    return best;
  };

  const sentence = closest(findSentenceEnds(text, from, to));
  if (sentence !== undefined) return sentence;

  const breaks: number[] = [];
  for (let p = from + 1; p <= to; p++) {
    if (/\s/.test(text.charAt(p - 1))) breaks.push(p);
  }
  return closest(breaks) ?? target;
}

/**
 * Split text into its first sentence and the remainder
 */
export function splitFirstSentence(text: string): { first: string; rest: string } {
  const leading = text.length - text.trimStart().length;
  const [end] = findSentenceEnds(text, leading);
  if (end === undefined) {
    return { first: text, rest: '' };
  }
  return { first: text.slice(0, end), rest: text.slice(end) };
}

/**
 * Split text into sentences, trimmed, dropping empties
 */
export function splitSentences(text: string): string[] {
  const sentences: string[] = [];
  let start = 0;
  for (const end of findSentenceEnds(text)) {
    const sentence = text.slice(start, end).trim();
    if (sentence) sentences.push(sentence);
    start = end;
  }
  const tail = text.slice(start).trim();
  if (tail) sentences.push(tail);
  return sentences;
}
