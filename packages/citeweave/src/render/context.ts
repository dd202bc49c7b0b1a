import type { Logger } from '../core/logger.js';
import type { Entry } from '../model/entry.js';
import type { Locale } from '../model/locale.js';
import type { NameOptions, Position, Style, StyleNode } from '../model/style.js';

export type RenderMode = 'citation' | 'bibliography' | 'sort';

/** Disambiguation settings the interpreter reads for one entry. */
export interface EntryDisambiguation {
  extraNames: number;
  givenNameLevels: readonly number[];
  /** Zero-based index of the assigned year-suffix letter. */
  yearSuffix?: number;
  /** Set once the engine needs `disambiguate="true"` branches for this entry. */
  conditionFlag: boolean;
}

export const EMPTY_DISAMBIGUATION: EntryDisambiguation = {
  extraNames: 0,
  givenNameLevels: [],
  conditionFlag: false
};

export interface CiteContext {
  position: Position;
  nearNote: boolean;
  locator?: string;
  label?: string;
  citationNumber?: number;
  firstReferenceNoteNumber?: number;
}

export const FIRST_CITE: CiteContext = { position: 'first', nearNote: false };

export interface RenderContext {
  style: Style;
  locale: Locale;
  entry: Entry;
  mode: RenderMode;
  cite: CiteContext;
  disambiguation: EntryDisambiguation;
  /** Renders without any year suffix; used to find collisions that letters must resolve. */
  omitYearSuffix?: boolean;
  logger?: Logger;
}

/** Name options in effect for a mode: style-wide, then citation or bibliography level. */
export const inheritedNameOptions = (style: Style, mode: RenderMode): NameOptions => {
  const scoped = mode === 'citation' ? style.citation.nameOptions : style.bibliography?.nameOptions;
  return { ...style.nameOptions, ...scoped };
};

/** Letters for year suffixes: a … z, then aa, ab, … */
export const yearSuffixLetter = (index: number): string => {
  let remaining = index;
  let letters = '';

  do {
    letters = String.fromCharCode(97 + (remaining % 26)) + letters;
    remaining = Math.floor(remaining / 26) - 1;
  } while (remaining >= 0);

  return letters;
};

const explicitYearSuffixCache = new WeakMap<Style, boolean>();

const mentionsYearSuffix = (nodes: readonly StyleNode[]): boolean =>
  nodes.some((node) => {
    switch (node.kind) {
      case 'text':
        return node.source.type === 'variable' && node.source.variable === 'year-suffix';
      case 'group':
        return mentionsYearSuffix(node.children);
      case 'names':
        return mentionsYearSuffix(node.substitute ?? []);
      case 'choose':
        return (
          node.branches.some((branch) => mentionsYearSuffix(branch.children)) ||
          mentionsYearSuffix(node.otherwise ?? [])
        );
      default:
        return false;
    }
  });

/** Whether the style places `year-suffix` itself; otherwise it follows the issued year. */
export const hasExplicitYearSuffix = (style: Style): boolean => {
  const cached = explicitYearSuffixCache.get(style);
  if (cached !== undefined) {
    return cached;
  }

  const explicit =
    mentionsYearSuffix(style.citation.layout.children) ||
    mentionsYearSuffix(style.bibliography?.layout.children ?? []) ||
    Object.values(style.macros).some((nodes) => mentionsYearSuffix(nodes));
  explicitYearSuffixCache.set(style, explicit);

  return explicit;
};
