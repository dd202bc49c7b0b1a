import type { EntryType } from './entry.js';
import type { TermForm, TermOverrides } from './locale.js';

export type TextCase = 'lowercase' | 'uppercase' | 'capitalize-first' | 'capitalize-all' | 'sentence' | 'title';

export type Display = 'block' | 'left-margin' | 'right-inline' | 'indent';

export interface Formatting {
  fontStyle?: 'normal' | 'italic' | 'oblique';
  fontVariant?: 'normal' | 'small-caps';
  fontWeight?: 'normal' | 'bold' | 'light';
  textDecoration?: 'none' | 'underline';
  verticalAlign?: 'baseline' | 'sup' | 'sub';
}

export interface Affixes {
  prefix?: string;
  suffix?: string;
}

export interface RenderOptions extends Affixes {
  formatting?: Formatting;
  display?: Display;
  textCase?: TextCase;
  quotes?: boolean;
  stripPeriods?: boolean;
}

export type DelimiterPrecedes = 'contextual' | 'after-inverted-name' | 'always' | 'never';

export interface NameOptions {
  and?: 'text' | 'symbol';
  delimiter?: string;
  delimiterPrecedesLast?: DelimiterPrecedes;
  delimiterPrecedesEtAl?: DelimiterPrecedes;
  etAlMin?: number;
  etAlUseFirst?: number;
  etAlSubsequentMin?: number;
  etAlSubsequentUseFirst?: number;
  etAlUseLast?: boolean;
  form?: 'long' | 'short' | 'count';
  initialize?: boolean;
  initializeWith?: string;
  nameAsSortOrder?: 'first' | 'all';
  sortSeparator?: string;
  familyFormatting?: Formatting;
  givenFormatting?: Formatting;
}

export type NamesLabelPosition = 'before' | 'after';

export interface LabelOptions extends RenderOptions {
  form?: TermForm;
  plural?: 'contextual' | 'always' | 'never';
}

export interface TextNode extends RenderOptions {
  kind: 'text';
  source:
    | { type: 'variable'; variable: string; form?: 'long' | 'short' }
    | { type: 'macro'; macro: string }
    | { type: 'term'; term: string; form?: TermForm; plural?: boolean }
    | { type: 'value'; value: string };
}

export interface NamesNode extends RenderOptions {
  kind: 'names';
  variables: string[];
  delimiter?: string;
  name?: NameOptions & RenderOptions;
  etAl?: { term?: 'et-al' | 'and others'; formatting?: Formatting };
  label?: LabelOptions & { position?: NamesLabelPosition };
  substitute?: StyleNode[];
}

export type DatePartName = 'year' | 'month' | 'day';

export interface DatePart extends RenderOptions {
  name: DatePartName;
  form?: 'long' | 'short' | 'numeric' | 'numeric-leading-zeros' | 'ordinal';
  rangeDelimiter?: string;
}

export interface DateNode extends RenderOptions {
  kind: 'date';
  variable: string;
  /** Localized form; when absent `parts` define a non-localized date. */
  form?: 'numeric' | 'text';
  dateParts?: 'year' | 'year-month' | 'year-month-day';
  parts?: DatePart[];
  delimiter?: string;
}

export interface NumberNode extends RenderOptions {
  kind: 'number';
  variable: string;
  form?: 'numeric' | 'ordinal' | 'long-ordinal' | 'roman';
}

export interface LabelNode extends LabelOptions {
  kind: 'label';
  variable: string;
}

export interface GroupNode extends RenderOptions {
  kind: 'group';
  children: StyleNode[];
  delimiter?: string;
}

export type Position = 'first' | 'subsequent' | 'ibid' | 'ibid-with-locator' | 'near-note';

export type Condition =
  | { test: 'type'; types: EntryType[] }
  | { test: 'variable'; variables: string[] }
  | { test: 'is-numeric'; variables: string[] }
  | { test: 'is-uncertain-date'; variables: string[] }
  | { test: 'locator'; labels: string[] }
  | { test: 'position'; positions: Position[] }
  | { test: 'disambiguate' }
  | { test: 'value'; variable: string; equals: string };

export interface ChooseBranch {
  conditions: Condition[];
  /** Defaults to `all`. Every value listed in a condition counts as its own test. */
  match?: 'all' | 'any' | 'none';
  children: StyleNode[];
}

export interface ChooseNode {
  kind: 'choose';
  branches: ChooseBranch[];
  otherwise?: StyleNode[];
}

export type StyleNode = TextNode | NamesNode | DateNode | NumberNode | LabelNode | GroupNode | ChooseNode;

export interface Layout extends Affixes {
  children: StyleNode[];
  delimiter?: string;
  formatting?: Formatting;
}

export interface SortKey {
  variable?: string;
  macro?: string;
  direction?: 'ascending' | 'descending';
  /** Where entries lacking the key go; independent of direction. Defaults to `last`. */
  missing?: 'first' | 'last';
}

export type GivennameRule =
  | 'all-names'
  | 'all-names-with-initials'
  | 'primary-name'
  | 'primary-name-with-initials'
  | 'by-cite';

export interface CitationOptions {
  disambiguateAddNames?: boolean;
  disambiguateAddGivenname?: boolean;
  givennameDisambiguationRule?: GivennameRule;
  disambiguateAddYearSuffix?: boolean;
  nearNoteDistance?: number;
  collapse?: 'citation-number';
  afterCollapseDelimiter?: string;
}

export type SubstituteRule = 'complete-all' | 'complete-each' | 'partial-each' | 'partial-first';

export interface BibliographyOptions {
  subsequentAuthorSubstitute?: string;
  /** Defaults to `complete-all`. */
  subsequentAuthorSubstituteRule?: SubstituteRule;
  hangingIndent?: boolean;
}

export interface CitationSpec {
  layout: Layout;
  sort?: SortKey[];
  options?: CitationOptions;
  nameOptions?: NameOptions;
}

export interface BibliographySpec {
  layout: Layout;
  sort?: SortKey[];
  options?: BibliographyOptions;
  nameOptions?: NameOptions;
}

export interface Style {
  class: 'in-text' | 'note';
  macros: Readonly<Record<string, StyleNode[]>>;
  citation: CitationSpec;
  bibliography?: BibliographySpec;
  nameOptions?: NameOptions;
  terms?: TermOverrides;
  demoteNonDroppingParticle?: 'never' | 'sort-only' | 'display-and-sort';
  initializeWithHyphen?: boolean;
  pageRangeFormat?: 'expanded' | 'minimal' | 'minimal-two' | 'chicago';
}

// Builders for assembling trees in code.

export const text = {
  variable: (variable: string, options: RenderOptions & { form?: 'long' | 'short' } = {}): TextNode => {
    const { form, ...rest } = options;
    return { kind: 'text', source: { type: 'variable', variable, ...(form ? { form } : {}) }, ...rest };
  },
  macro: (macro: string, options: RenderOptions = {}): TextNode => ({
    kind: 'text',
    source: { type: 'macro', macro },
    ...options
  }),
  term: (term: string, options: RenderOptions & { form?: TermForm; plural?: boolean } = {}): TextNode => {
    const { form, plural, ...rest } = options;
    return {
      kind: 'text',
      source: { type: 'term', term, ...(form ? { form } : {}), ...(plural !== undefined ? { plural } : {}) },
      ...rest
    };
  },
  value: (value: string, options: RenderOptions = {}): TextNode => ({
    kind: 'text',
    source: { type: 'value', value },
    ...options
  })
};

export const group = (children: StyleNode[], options: RenderOptions & { delimiter?: string } = {}): GroupNode => ({
  kind: 'group',
  children,
  ...options
});

export const names = (variables: string[], options: Omit<NamesNode, 'kind' | 'variables'> = {}): NamesNode => ({
  kind: 'names',
  variables,
  ...options
});

export const date = (variable: string, options: Omit<DateNode, 'kind' | 'variable'> = {}): DateNode => ({
  kind: 'date',
  variable,
  ...options
});

export const number = (variable: string, options: Omit<NumberNode, 'kind' | 'variable'> = {}): NumberNode => ({
  kind: 'number',
  variable,
  ...options
});

export const label = (variable: string, options: Omit<LabelNode, 'kind' | 'variable'> = {}): LabelNode => ({
  kind: 'label',
  variable,
  ...options
});

export const choose = (branches: ChooseBranch[], otherwise?: StyleNode[]): ChooseNode => ({
  kind: 'choose',
  branches,
  ...(otherwise ? { otherwise } : {})
});

export const when = (
  conditions: Condition[],
  children: StyleNode[],
  match: ChooseBranch['match'] = 'all'
): ChooseBranch => ({ conditions, children, match });
