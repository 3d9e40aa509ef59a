import type { NumberVocabulary } from './rules.js';

type WordKind = 'unit' | 'teen' | 'ten' | 'hundred' | 'connector';

interface NumberWord {
  kind: WordKind;
  value: number;
  /** Punctuation glued to the end of the token, e.g. the comma in "fifty,". */
  trailing: string;
}

interface Parsed {
  value: number;
  next: number;
}

const MAX_RUN = 5;

function readWord(token: string | undefined, vocabulary: NumberVocabulary): NumberWord | undefined {
  const match = token?.match(/^([A-Za-z]+)([.,!?;:]*)$/);
  if (!match) return undefined;
  const word = (match[1] ?? '').toLowerCase();
  const trailing = match[2] ?? '';

  const unit = vocabulary.units[word];
  if (unit !== undefined) return { kind: 'unit', value: unit, trailing };
  const teen = vocabulary.teens[word];
  if (teen !== undefined) return { kind: 'teen', value: teen, trailing };
  const ten = vocabulary.tens[word];
  if (ten !== undefined) return { kind: 'ten', value: ten, trailing };
  if (word === vocabulary.hundred) return { kind: 'hundred', value: 100, trailing };
  if (word === vocabulary.connector) return { kind: 'connector', value: 0, trailing };
  return undefined;
}

function parseBelowHundred(words: NumberWord[], at: number): Parsed | undefined {
  const first = words[at];
  if (!first) return undefined;
  if (first.kind === 'ten') {
    const second = words[at + 1];
    if (second?.kind === 'unit') {
      return { value: first.value + second.value, next: at + 2 };
    }
    return { value: first.value, next: at + 1 };
  }
  if (first.kind === 'teen' || first.kind === 'unit') {
    return { value: first.value, next: at + 1 };
  }
  return undefined;
}

/** Whatever follows "hundred": an optional connector, then a number below one hundred. */
function parseAfterHundred(words: NumberWord[], at: number): Parsed | undefined {
  const index = words[at]?.kind === 'connector' ? at + 1 : at;
  return parseBelowHundred(words, index);
}

function parseRun(words: NumberWord[]): Parsed | undefined {
  const first = words[0];
  const second = words[1];
  if (!first) return undefined;

  if (first.kind === 'unit' && second?.kind === 'hundred') {
    const rest = parseAfterHundred(words, 2);
    return { value: first.value * 100 + (rest?.value ?? 0), next: rest?.next ?? 2 };
  }
  // Yardage shorthand: "one fifty" is 150, "two ten" is 210.
  if (first.kind === 'unit' && (second?.kind === 'ten' || second?.kind === 'teen')) {
    const rest = parseBelowHundred(words, 1);
    if (rest) {
      return { value: first.value * 100 + rest.value, next: rest.next };
    }
  }
  if (first.kind === 'hundred') {
    const rest = parseAfterHundred(words, 1);
    return { value: 100 + (rest?.value ?? 0), next: rest?.next ?? 1 };
  }
  return parseBelowHundred(words, 0);
}

/**
 * Rewrites runs of spoken number words as digits. Expects single-space separated
 * text; a token with trailing punctuation ends a run.
 */
export function convertSpokenNumbers(text: string, vocabulary: NumberVocabulary): string {
  const tokens = text.split(' ');
  const output: string[] = [];

  let index = 0;
  while (index < tokens.length) {
    const run: NumberWord[] = [];
    for (let cursor = index; cursor < tokens.length && run.length < MAX_RUN; cursor++) {
      const word = readWord(tokens[cursor], vocabulary);
      if (!word) break;
      run.push(word);
      if (word.trailing) break;
    }

    const parsed = run.length > 0 ? parseRun(run) : undefined;
    if (parsed) {
      const last = run[parsed.next - 1];
      output.push(`${parsed.value}${last?.trailing ?? ''}`);
      index += parsed.next;
    } else {
      output.push(tokens[index] ?? '');
      index += 1;
    }
  }

  return output.join(' ');
}
