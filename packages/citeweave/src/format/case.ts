import type { TextCase } from '../model/style.js';
import type { TextRun } from './runs.js';

const STOP_WORDS = new Set([
  'a',
  'an',
  'and',
  'as',
  'at',
  'but',
  'by',
  'down',
  'for',
  'from',
  'in',
  'into',
  'nor',
  'of',
  'on',
  'onto',
  'or',
  'over',
  'per',
  'so',
  'the',
  'till',
  'to',
  'up',
  'upon',
  'v',
  'via',
  'vs',
  'with',
  'yet'
]);

const WORD = /[\p{L}\p{N}'’]+/gu;
const SENTENCE_BREAK = /[:?!]\s*$/;

type CaseOp = 'upper' | 'lower';

interface Word {
  start: number;
  end: number;
  value: string;
  locked: boolean;
}

const firstCharLength = (value: string): number => {
  const codePoint = value.codePointAt(0);
  return codePoint === undefined ? 0 : String.fromCodePoint(codePoint).length;
};

const hasUpper = (value: string): boolean => value !== value.toLowerCase();

const hasLower = (value: string): boolean => value !== value.toUpperCase();

class CaseCanvas {
  readonly full: string;
  readonly locked: boolean[];
  readonly ops: Array<CaseOp | undefined>;

  constructor(private readonly runs: readonly TextRun[]) {
    this.full = runs.map((run) => run.text).join('');
    this.locked = runs.flatMap((run) => Array.from({ length: run.text.length }, () => run.verbatim === true));
    this.ops = new Array<CaseOp | undefined>(this.full.length).fill(undefined);
  }

  words(): Word[] {
    return [...this.full.matchAll(WORD)].map((match) => {
      const start = match.index ?? 0;
      const end = start + match[0].length;
      return {
        start,
        end,
        value: match[0],
        locked: this.locked.slice(start, end).some(Boolean)
      };
    });
  }

  /** True when no unlocked letter is lower-case, i.e. the input arrived in all caps. */
  shouting(): boolean {
    const unlocked = this.full.split('').filter((_, index) => !this.locked[index]).join('');
    return hasUpper(unlocked) && !hasLower(unlocked);
  }

  set(start: number, end: number, op: CaseOp): void {
    for (let index = start; index < end; index += 1) {
      if (!this.locked[index]) {
        this.ops[index] = op;
      }
    }
  }

  capitalize(word: Word, restOp?: CaseOp): void {
    const head = firstCharLength(word.value);
    this.set(word.start, word.start + head, 'upper');
    if (restOp) {
      this.set(word.start + head, word.end, restOp);
    }
  }

  precededByBreak(word: Word): boolean {
    return SENTENCE_BREAK.test(this.full.slice(0, word.start));
  }

  apply(): TextRun[] {
    let offset = 0;

    return this.runs.map((run) => {
      const start = offset;
      offset += run.text.length;
      if (run.verbatim) {
        return run;
      }

      let output = '';
      let index = 0;
      while (index < run.text.length) {
        const op = this.ops[start + index];
        let end = index + 1;
        while (end < run.text.length && this.ops[start + end] === op) {
          end += 1;
        }

        const chunk = run.text.slice(index, end);
        output += op === 'upper' ? chunk.toUpperCase() : op === 'lower' ? chunk.toLowerCase() : chunk;
        index = end;
      }

      return output === run.text ? run : { ...run, text: output };
    });
  }
}

const titleCase = (canvas: CaseCanvas): void => {
  if (canvas.shouting()) {
    canvas.set(0, canvas.full.length, 'lower');
  }

  const words = canvas.words();
  words.forEach((word, index) => {
    if (word.locked) {
      return;
    }

    const effective = canvas.shouting() ? word.value.toLowerCase() : word.value;
    if (hasUpper(effective)) {
      return;
    }

    const edge = index === 0 || index === words.length - 1 || canvas.precededByBreak(word);
    if (!edge && STOP_WORDS.has(effective)) {
      return;
    }

    canvas.capitalize(word);
  });
};

const sentenceCase = (canvas: CaseCanvas): void => {
  const shouting = canvas.shouting();

  canvas.words().forEach((word, index) => {
    if (word.locked) {
      return;
    }

    const tail = word.value.slice(firstCharLength(word.value));
    const keepsCase = !shouting && hasUpper(tail);
    const startsSentence = index === 0 || canvas.precededByBreak(word);

    if (startsSentence) {
      canvas.capitalize(word, keepsCase ? undefined : 'lower');
    } else if (!keepsCase) {
      canvas.set(word.start, word.end, 'lower');
    }
  });
};

/**
 * Applies a CSL text-case to a sequence of runs. Verbatim runs are never
 * touched; title casing only happens for English locales.
 */
export const applyTextCase = (runs: TextRun[], textCase: TextCase | undefined, english: boolean): TextRun[] => {
  if (!textCase || runs.length === 0) {
    return runs;
  }

  const canvas = new CaseCanvas(runs);

  switch (textCase) {
    case 'uppercase':
      canvas.set(0, canvas.full.length, 'upper');
      break;
    case 'lowercase':
      canvas.set(0, canvas.full.length, 'lower');
      break;
    case 'capitalize-first': {
      const first = canvas.words()[0];
      if (first && !first.locked) {
        canvas.capitalize(first);
      }
      break;
    }
    case 'capitalize-all':
      for (const word of canvas.words()) {
        if (!word.locked) {
          canvas.capitalize(word);
        }
      }
      break;
    case 'sentence':
      sentenceCase(canvas);
      break;
    case 'title':
      if (!english) {
        return runs;
      }
      titleCase(canvas);
      break;
  }

  return canvas.apply();
};
