import type { PersonName } from '../model/entry.js';
import type { Locale, TermOverrides } from '../model/locale.js';
import { lookupTerm } from '../model/locale.js';
import type { DelimiterPrecedes, Formatting, NameOptions, Style } from '../model/style.js';
import { punctuation } from './runs.js';
import type { TextRun } from './runs.js';

export type ParticleDemotion = NonNullable<Style['demoteNonDroppingParticle']>;

export interface NameFormatContext {
  locale: Locale;
  overrides?: TermOverrides;
  variable: string;
  /** Subsequent cites switch to the `etAlSubsequent*` thresholds. */
  subsequent: boolean;
  demoteNonDroppingParticle: ParticleDemotion;
  initializeWithHyphen: boolean;
}

/** Disambiguation hooks for one name list. */
export interface NameExpansion {
  extraNames: number;
  /** Per shown name: 0 as styled, 1 given name initials exposed, 2 full given name. */
  givenNameLevels: readonly number[];
}

export const NO_EXPANSION: NameExpansion = { extraNames: 0, givenNameLevels: [] };

type NamePart = 'given' | 'family' | 'other';

interface Segment {
  text: string;
  part: NamePart;
}

const trailingWhitespace = (value: string): string => value.match(/\s*$/)?.[0] ?? '';

const firstLetter = (value: string): string => {
  const codePoint = value.codePointAt(0);
  return codePoint === undefined ? '' : String.fromCodePoint(codePoint);
};

/**
 * Reduces given names to initials: `Laurenz Elias` → `L. E.`, and with hyphen
 * handling `Hans-Joseph` → `H.-J.`. Lower-case particles inside the given name
 * are kept as written.
 */
export const initializeGiven = (given: string, initializeWith: string, withHyphen: boolean): string => {
  const joiner = trailingWhitespace(initializeWith);
  const mark = initializeWith.trimEnd();
  let output = '';

  for (const token of given.trim().split(/\s+/)) {
    if (token.length === 0) {
      continue;
    }

    const head = firstLetter(token);
    if (head !== head.toUpperCase()) {
      output += `${token} `;
      continue;
    }

    const initials = token
      .split('-')
      .filter((part) => part.replace(/\./g, '').length > 0)
      .map((part) => `${firstLetter(part.replace(/^\./, ''))}${mark}`);
    output += (withHyphen ? initials.join('-') : initials.join('')) + joiner;
  }

  return output.trimEnd();
};

interface NameShape {
  inverted: boolean;
  form: 'long' | 'short';
  initializeWith?: string;
}

const join = (...values: Array<string | undefined>): string =>
  values.filter((value): value is string => Boolean(value && value.trim().length > 0)).join(' ');

const nameSegments = (name: PersonName, shape: NameShape, options: NameOptions, context: NameFormatContext): Segment[] => {
  if (name.literal) {
    return [{ text: name.literal, part: 'family' }];
  }

  const family = name.family ?? '';
  const nonDropping = name.nonDroppingParticle;
  const given =
    name.given && shape.initializeWith !== undefined
      ? initializeGiven(name.given, shape.initializeWith, context.initializeWithHyphen)
      : name.given;

  if (shape.form === 'short' || !given) {
    const segments: Segment[] = [{ text: join(nonDropping, family), part: 'family' }];
    if (!given && shape.form === 'long') {
      if (name.droppingParticle) {
        segments.unshift({ text: `${name.droppingParticle} `, part: 'other' });
      }
      if (name.suffix) {
        segments.push({ text: `${name.commaSuffix ? ', ' : ' '}${name.suffix}`, part: 'other' });
      }
    }
    return segments;
  }

  if (!shape.inverted) {
    const segments: Segment[] = [
      { text: given, part: 'given' },
      { text: ` ${join(name.droppingParticle, nonDropping, family)}`, part: 'family' }
    ];
    if (name.suffix) {
      segments.push({ text: `${name.commaSuffix ? ', ' : ' '}${name.suffix}`, part: 'other' });
    }
    return segments;
  }

  const separator = options.sortSeparator ?? ', ';
  const demoted = context.demoteNonDroppingParticle === 'display-and-sort';
  const segments: Segment[] = [
    { text: demoted ? family : join(nonDropping, family), part: 'family' },
    { text: separator, part: 'other' },
    { text: demoted ? join(given, name.droppingParticle, nonDropping) : join(given, name.droppingParticle), part: 'given' }
  ];
  if (name.suffix) {
    segments.push({ text: `${separator}${name.suffix}`, part: 'other' });
  }

  return segments;
};

const segmentFormatting = (part: NamePart, options: NameOptions): Formatting | undefined => {
  if (part === 'family') {
    return options.familyFormatting;
  }
  if (part === 'given') {
    return options.givenFormatting;
  }
  return undefined;
};

export const formatName = (
  name: PersonName,
  options: NameOptions,
  context: NameFormatContext,
  inverted: boolean,
  level = 0
): TextRun[] => {
  const baseForm = options.form === 'short' ? 'short' : 'long';
  const initializes = options.initializeWith !== undefined && options.initialize !== false;
  const shape: NameShape = {
    inverted,
    form: baseForm,
    initializeWith: initializes ? options.initializeWith : undefined
  };

  if (level >= 2) {
    shape.form = 'long';
    shape.initializeWith = undefined;
  } else if (level === 1 && baseForm === 'short') {
    shape.form = 'long';
    shape.initializeWith = options.initializeWith ?? '. ';
  }

  return nameSegments(name, shape, options, context)
    .filter((segment) => segment.text.length > 0)
    .map((segment) => {
      const formatting = segmentFormatting(segment.part, options);
      return {
        text: segment.text,
        tag: 'name' as const,
        variable: context.variable,
        ...(formatting ? { formatting } : {})
      };
    });
};

const precedes = (rule: DelimiterPrecedes, shownCount: number, previousInverted: boolean, contextualMin: number): boolean => {
  switch (rule) {
    case 'always':
      return true;
    case 'never':
      return false;
    case 'after-inverted-name':
      return previousInverted;
    case 'contextual':
      return shownCount >= contextualMin;
  }
};

export interface NameListLayout {
  shown: number;
  truncated: boolean;
  useLast: boolean;
}

/** How many names a list shows after et-al truncation and disambiguation. */
export const layoutNameList = (
  total: number,
  options: NameOptions,
  subsequent: boolean,
  expansion: NameExpansion
): NameListLayout => {
  const etAlMin = subsequent && options.etAlSubsequentMin ? options.etAlSubsequentMin : options.etAlMin;
  const useFirst =
    subsequent && options.etAlSubsequentUseFirst ? options.etAlSubsequentUseFirst : options.etAlUseFirst;

  if (!etAlMin || !useFirst || total < etAlMin) {
    return { shown: total, truncated: false, useLast: false };
  }

  const shown = Math.min(total, useFirst + expansion.extraNames);
  const truncated = shown < total;
  return {
    shown,
    truncated,
    useLast: truncated && options.etAlUseLast === true && total >= shown + 2
  };
};

const isInverted = (options: NameOptions, index: number): boolean =>
  options.nameAsSortOrder === 'all' || (options.nameAsSortOrder === 'first' && index === 0);

/**
 * Renders a list of person names with et-al truncation, the final-name
 * conjunction and the disambiguation expansion for this list.
 */
export const formatNameList = (
  names: readonly PersonName[],
  options: NameOptions,
  context: NameFormatContext,
  expansion: NameExpansion = NO_EXPANSION,
  etAlFormatting?: Formatting
): TextRun[] => {
  if (names.length === 0) {
    return [];
  }

  const layout = layoutNameList(names.length, options, context.subsequent, expansion);

  if (options.form === 'count') {
    return [{ text: String(layout.shown), tag: 'number', variable: context.variable }];
  }

  const delimiter = options.delimiter ?? ', ';
  const shown = names.slice(0, layout.shown);
  const rendered = shown.map((name, index) =>
    formatName(name, options, context, isInverted(options, index), expansion.givenNameLevels[index] ?? 0)
  );

  const conjunction =
    options.and === 'symbol' ? '&' : options.and === 'text' ? lookupTerm(context.locale, context.overrides, 'and') : undefined;

  const runs: TextRun[] = [];
  rendered.forEach((nameRuns, index) => {
    if (index > 0) {
      const isLast = index === rendered.length - 1 && !layout.truncated;
      if (isLast && conjunction) {
        const withDelimiter = precedes(
          options.delimiterPrecedesLast ?? 'contextual',
          rendered.length,
          isInverted(options, index - 1),
          3
        );
        runs.push(punctuation(withDelimiter ? `${delimiter}${conjunction} ` : ` ${conjunction} `));
      } else {
        runs.push(punctuation(delimiter));
      }
    }
    runs.push(...nameRuns);
  });

  if (!layout.truncated) {
    return runs;
  }

  if (layout.useLast) {
    const last = names[names.length - 1];
    if (last) {
      runs.push(punctuation(`${delimiter}… `));
      runs.push(...formatName(last, options, context, isInverted(options, names.length - 1)));
    }
    return runs;
  }

  const etAl = lookupTerm(context.locale, context.overrides, 'et-al') ?? 'et al.';
  const withDelimiter = precedes(
    options.delimiterPrecedesEtAl ?? 'contextual',
    layout.shown,
    isInverted(options, layout.shown - 1),
    2
  );
  runs.push(punctuation(withDelimiter ? delimiter : ' '));
  runs.push({
    text: etAl,
    tag: 'term',
    variable: context.variable,
    ...(etAlFormatting ? { formatting: etAlFormatting } : {})
  });

  return runs;
};
