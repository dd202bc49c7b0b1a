import type { FormattableString, PersonName } from '../model/entry.js';
import { lookupVariable, variableAsString } from '../model/entry.js';
import { isEnglish, lookupTerm } from '../model/locale.js';
import type {
  DateNode,
  GroupNode,
  LabelNode,
  LabelOptions,
  Layout,
  NamesNode,
  NumberNode,
  RenderOptions,
  StyleNode,
  TextNode
} from '../model/style.js';
import { applyTextCase } from '../format/case.js';
import { dateSortKey, formatDate } from '../format/dates.js';
import { formatNameList, NO_EXPANSION } from '../format/names.js';
import type { NameFormatContext } from '../format/names.js';
import { formatNumber, formatPageRange, isPluralValue, parseInteger } from '../format/numbers.js';
import {
  applyDisplay,
  applyFormatting,
  hasText,
  joinWithDelimiter,
  punctuation,
  stripPeriods,
  wrapAffixes,
  wrapQuotes
} from '../format/runs.js';
import type { RunTag, TextRun } from '../format/runs.js';
import { branchMatches } from './conditions.js';
import { hasExplicitYearSuffix, inheritedNameOptions, yearSuffixLetter } from './context.js';
import type { RenderContext } from './context.js';

/** Output of one element plus the bookkeeping groups need for suppression. */
interface NodeOutput {
  runs: TextRun[];
  /** Variable-calling elements evaluated. */
  called: number;
  /** Of those, how many produced text. */
  rendered: number;
}

const EMPTY: NodeOutput = { runs: [], called: 0, rendered: 0 };

const MAX_MACRO_DEPTH = 32;

const TITLE_VARIABLES = new Set([
  'title',
  'title-short',
  'container-title',
  'container-title-short',
  'collection-title',
  'original-title',
  'event-title',
  'reviewed-title',
  'volume-title'
]);

const PAGE_VARIABLES = new Set(['page', 'page-first']);

const COUNT_LABEL_TERMS: Record<string, string> = {
  'number-of-pages': 'page',
  'number-of-volumes': 'volume'
};

const variableTag = (variable: string): RunTag => (TITLE_VARIABLES.has(variable) ? 'title' : 'text');

const formattableRuns = (value: FormattableString, tag: RunTag, variable: string): TextRun[] => {
  const runs: TextRun[] = [];
  let cursor = 0;

  for (const span of value.verbatim) {
    if (span.start > cursor) {
      runs.push({ text: value.value.slice(cursor, span.start), tag, variable });
    }
    runs.push({ text: value.value.slice(span.start, span.end), tag, variable, verbatim: true });
    cursor = span.end;
  }
  if (cursor < value.value.length) {
    runs.push({ text: value.value.slice(cursor), tag, variable });
  }

  return runs;
};

const combine = (outputs: readonly NodeOutput[], delimiter?: string): NodeOutput => ({
  runs: joinWithDelimiter(
    outputs.map((output) => output.runs),
    delimiter
  ),
  called: outputs.reduce((sum, output) => sum + output.called, 0),
  rendered: outputs.reduce((sum, output) => sum + output.rendered, 0)
});

/** A group whose variables all came back empty disappears with its affixes and delimiters. */
const suppressIfVacant = (output: NodeOutput): NodeOutput =>
  output.called > 0 && output.rendered === 0 ? { runs: [], called: output.called, rendered: 0 } : output;

class StyleInterpreter {
  private readonly suppressed = new Set<string>();
  private readonly english: boolean;
  private readonly explicitYearSuffix: boolean;
  private yearSuffixRendered = false;
  private expansionUsed = false;
  private quoteDepth = 0;
  private macroDepth = 0;

  constructor(private readonly context: RenderContext) {
    this.english = isEnglish(context.locale);
    this.explicitYearSuffix = hasExplicitYearSuffix(context.style);
  }

  render(nodes: readonly StyleNode[]): TextRun[] {
    const runs = combine(nodes.flatMap((node) => this.renderParts(node))).runs;

    // Ibid cites stand in for the previous cite; they never carry a trailing letter.
    const { position } = this.context.cite;
    const repeats = position === 'ibid' || position === 'ibid-with-locator';
    const suffix = this.pendingYearSuffix();
    if (this.context.mode === 'citation' && !repeats && suffix && !this.yearSuffixRendered && hasText(runs)) {
      this.yearSuffixRendered = true;
      return [...runs, punctuation(' '), suffix];
    }

    return runs;
  }

  /** `choose` contributes each child of the chosen branch as its own part of the parent. */
  private renderParts(node: StyleNode): NodeOutput[] {
    if (node.kind !== 'choose') {
      return [this.renderNode(node)];
    }

    const branch = node.branches.find((candidate) => branchMatches(this.context, candidate));
    const children = branch ? branch.children : node.otherwise ?? [];
    return children.flatMap((child) => this.renderParts(child));
  }

  private renderNode(node: Exclude<StyleNode, { kind: 'choose' }>): NodeOutput {
    if (node.quotes) {
      this.quoteDepth += 1;
    }

    let output: NodeOutput;
    try {
      output = this.renderContent(node);
    } finally {
      if (node.quotes) {
        this.quoteDepth -= 1;
      }
    }

    return { ...output, runs: this.finish(output.runs, node) };
  }

  private renderContent(node: Exclude<StyleNode, { kind: 'choose' }>): NodeOutput {
    switch (node.kind) {
      case 'text':
        return this.renderText(node);
      case 'names':
        return this.renderNames(node);
      case 'date':
        return this.renderDate(node);
      case 'number':
        return this.renderNumber(node);
      case 'label':
        return { runs: this.renderLabel(node), called: 0, rendered: 0 };
      case 'group':
        return this.renderGroup(node);
    }
  }

  private finish(content: TextRun[], options: RenderOptions): TextRun[] {
    if (!hasText(content)) {
      return [];
    }

    let runs = options.stripPeriods ? stripPeriods(content) : content;
    runs = applyTextCase(runs, options.textCase, this.english);
    runs = applyFormatting(runs, options.formatting);
    if (options.quotes) {
      runs = this.quote(runs);
    }
    runs = wrapAffixes(runs, options);

    return applyDisplay(runs, options.display);
  }

  private quote(runs: TextRun[]): TextRun[] {
    const inner = this.quoteDepth % 2 === 1;
    const open = this.term(inner ? 'open-inner-quote' : 'open-quote') ?? (inner ? '‘' : '“');
    const close = this.term(inner ? 'close-inner-quote' : 'close-quote') ?? (inner ? '’' : '”');
    return wrapQuotes(runs, open, close);
  }

  private term(name: string, form: LabelOptions['form'] = 'long', plural = false): string | undefined {
    return lookupTerm(this.context.locale, this.context.style.terms, name, form, plural);
  }

  private renderGroup(node: GroupNode): NodeOutput {
    const parts = node.children.flatMap((child) => this.renderParts(child));
    return suppressIfVacant(combine(parts, node.delimiter));
  }

  private renderText(node: TextNode): NodeOutput {
    const { source } = node;

    switch (source.type) {
      case 'value':
        return { runs: [{ text: source.value, tag: 'text' }], called: 0, rendered: 0 };
      case 'term': {
        const value = this.term(source.term, source.form, source.plural ?? false);
        return { runs: value ? [{ text: value, tag: 'term' }] : [], called: 0, rendered: 0 };
      }
      case 'macro':
        return this.renderMacro(source.macro);
      case 'variable': {
        const runs = this.textVariable(source.variable, source.form);
        return { runs, called: 1, rendered: hasText(runs) ? 1 : 0 };
      }
    }
  }

  private renderMacro(name: string): NodeOutput {
    const nodes = this.context.style.macros[name];
    if (!nodes) {
      this.context.logger?.debug('Style references an undefined macro', { macro: name });
      return EMPTY;
    }
    if (this.macroDepth >= MAX_MACRO_DEPTH) {
      this.context.logger?.debug('Macro nesting limit reached', { macro: name });
      return EMPTY;
    }

    this.macroDepth += 1;
    try {
      return suppressIfVacant(combine(nodes.flatMap((node) => this.renderParts(node))));
    } finally {
      this.macroDepth -= 1;
    }
  }

  private textVariable(variable: string, form?: 'long' | 'short'): TextRun[] {
    const { cite, style } = this.context;

    switch (variable) {
      case 'citation-number':
        return cite.citationNumber === undefined
          ? []
          : [{ text: String(cite.citationNumber), tag: 'citation-number', variable }];
      case 'first-reference-note-number':
        return cite.firstReferenceNoteNumber === undefined
          ? []
          : [{ text: String(cite.firstReferenceNoteNumber), tag: 'number', variable }];
      case 'locator': {
        if (!cite.locator) {
          return [];
        }
        const label = cite.label ?? 'page';
        const value = label === 'page' ? formatPageRange(cite.locator, style.pageRangeFormat) : cite.locator;
        return [{ text: value, tag: 'locator', variable }];
      }
      case 'year-suffix': {
        const suffix = this.pendingYearSuffix();
        if (!suffix) {
          return [];
        }
        this.yearSuffixRendered = true;
        return [suffix];
      }
    }

    if (this.suppressed.has(variable)) {
      return [];
    }

    const value =
      (form === 'short' ? lookupVariable(this.context.entry, `${variable}-short`) : undefined) ??
      lookupVariable(this.context.entry, variable);
    if (!value) {
      return [];
    }

    switch (value.kind) {
      case 'text':
        if (PAGE_VARIABLES.has(variable)) {
          return [{ text: formatPageRange(value.text.value, style.pageRangeFormat), tag: 'text', variable }];
        }
        return formattableRuns(value.text, variableTag(variable), variable);
      case 'number':
        return [{ text: variableAsString(value), tag: 'number', variable }];
      default: {
        const text = variableAsString(value);
        return text ? [{ text, tag: 'text', variable }] : [];
      }
    }
  }

  private pendingYearSuffix(): TextRun | undefined {
    const { yearSuffix } = this.context.disambiguation;
    if (yearSuffix === undefined || this.context.omitYearSuffix || this.yearSuffixRendered) {
      return undefined;
    }
    if (this.context.mode === 'sort') {
      return undefined;
    }

    return { text: yearSuffixLetter(yearSuffix), tag: 'year-suffix', variable: 'year-suffix' };
  }

  private nameContext(variable: string): NameFormatContext {
    const { style, locale, cite, mode } = this.context;
    return {
      locale,
      overrides: style.terms,
      variable,
      subsequent: mode === 'citation' && cite.position !== 'first',
      demoteNonDroppingParticle: style.demoteNonDroppingParticle ?? 'display-and-sort',
      initializeWithHyphen: style.initializeWithHyphen ?? true
    };
  }

  private renderNames(node: NamesNode): NodeOutput {
    const { mode, disambiguation } = this.context;
    const options = { ...inheritedNameOptions(this.context.style, mode), ...node.name };
    if (mode === 'sort') {
      options.nameAsSortOrder = 'all';
    }

    const parts: TextRun[][] = [];
    let rendered = 0;

    for (const variable of node.variables) {
      if (this.suppressed.has(variable)) {
        continue;
      }

      const value = lookupVariable(this.context.entry, variable);
      if (value?.kind !== 'names' || value.names.length === 0) {
        continue;
      }

      const expansion = this.expansionUsed || mode === 'sort' ? NO_EXPANSION : disambiguation;
      const etAlFormatting = node.etAl?.formatting;
      let list = formatNameList(value.names, options, this.nameContext(variable), expansion, etAlFormatting);
      if (node.etAl?.term === 'and others') {
        const andOthers = this.term('and others') ?? 'and others';
        list = list.map((run) => (run.tag === 'term' && run.variable === variable ? { ...run, text: andOthers } : run));
      }
      this.expansionUsed = true;

      list = this.finish(list, node.name ?? {});
      parts.push(this.withNamesLabel(list, node, variable, value.names));
      rendered += 1;
    }

    if (rendered > 0 || !node.substitute) {
      return {
        runs: joinWithDelimiter(parts, node.delimiter ?? options.delimiter),
        called: node.variables.length,
        rendered
      };
    }

    return this.substitute(node);
  }

  private withNamesLabel(list: TextRun[], node: NamesNode, variable: string, names: readonly PersonName[]): TextRun[] {
    if (!node.label || !hasText(list) || node.name?.form === 'count') {
      return list;
    }

    const plural = node.label.plural === 'always' || (node.label.plural !== 'never' && names.length > 1);
    const value = this.term(variable, node.label.form ?? 'long', plural);
    if (!value) {
      return list;
    }

    const labelRuns = this.finish([{ text: value, tag: 'term', variable }], node.label);
    return node.label.position === 'before' ? [...labelRuns, ...list] : [...list, ...labelRuns];
  }

  private substitute(node: NamesNode): NodeOutput {
    for (const candidate of node.substitute ?? []) {
      const inherited: StyleNode =
        candidate.kind === 'names'
          ? {
              ...candidate,
              name: candidate.name ?? node.name,
              label: candidate.label ?? node.label,
              delimiter: candidate.delimiter ?? node.delimiter,
              substitute: undefined
            }
          : candidate;

      const output = combine(this.renderParts(inherited));
      if (hasText(output.runs)) {
        for (const run of output.runs) {
          if (run.variable) {
            this.suppressed.add(run.variable);
          }
        }
        return { runs: output.runs, called: node.variables.length + output.called, rendered: output.rendered || 1 };
      }
    }

    return { runs: [], called: node.variables.length, rendered: 0 };
  }

  private renderDate(node: DateNode): NodeOutput {
    if (this.suppressed.has(node.variable)) {
      return { runs: [], called: 1, rendered: 0 };
    }

    const value = lookupVariable(this.context.entry, node.variable);
    if (value?.kind !== 'date') {
      return { runs: [], called: 1, rendered: 0 };
    }

    if (this.context.mode === 'sort') {
      return { runs: [{ text: dateSortKey(value.date), tag: 'date', variable: node.variable }], called: 1, rendered: 1 };
    }

    const suffix =
      node.variable === 'issued' && !this.explicitYearSuffix ? this.pendingYearSuffix() : undefined;
    const { runs, yearSuffixUsed } = formatDate(
      value.date,
      node,
      {
        locale: this.context.locale,
        overrides: this.context.style.terms,
        english: this.english,
        variable: node.variable
      },
      suffix
    );
    if (yearSuffixUsed) {
      this.yearSuffixRendered = true;
    }

    return { runs, called: 1, rendered: hasText(runs) ? 1 : 0 };
  }

  private renderNumber(node: NumberNode): NodeOutput {
    if (this.suppressed.has(node.variable)) {
      return { runs: [], called: 1, rendered: 0 };
    }

    const value = lookupVariable(this.context.entry, node.variable);
    let text = '';
    if (value?.kind === 'number') {
      const { prefix = '', suffix = '' } = value.number;
      text = `${prefix}${this.formatNumeric(value.number.value, node)}${suffix}`;
    } else if (value?.kind === 'text') {
      text = this.formatNumeric(value.text.value, node);
    }

    const runs: TextRun[] = text ? [{ text, tag: 'number', variable: node.variable }] : [];
    return { runs, called: 1, rendered: runs.length };
  }

  private formatNumeric(value: string | number, node: NumberNode): string {
    const { locale, style, mode } = this.context;
    const integer = parseInteger(value);
    if (mode === 'sort' && integer !== null) {
      return String(integer).padStart(8, '0');
    }

    return formatNumber(value, node.form ?? 'numeric', locale, style.terms);
  }

  private renderLabel(node: LabelNode): TextRun[] {
    const { cite } = this.context;

    if (node.variable === 'locator') {
      if (!cite.locator) {
        return [];
      }
      return this.labelRuns(node, cite.label ?? 'page', isPluralValue(cite.locator));
    }

    const value = lookupVariable(this.context.entry, node.variable);
    if (!value || this.suppressed.has(node.variable)) {
      return [];
    }

    const countTerm = COUNT_LABEL_TERMS[node.variable];
    if (countTerm) {
      const count = value.kind === 'number' ? parseInteger(value.number.value) : parseInteger(variableAsString(value));
      return this.labelRuns(node, countTerm, count !== null && count > 1);
    }

    switch (value.kind) {
      case 'names':
        return value.names.length === 0 ? [] : this.labelRuns(node, node.variable, value.names.length > 1);
      case 'number':
        return this.labelRuns(node, node.variable, isPluralValue(value.number.value));
      case 'text':
        return value.text.value ? this.labelRuns(node, node.variable, isPluralValue(value.text.value)) : [];
      default:
        return [];
    }
  }

  private labelRuns(node: LabelNode, term: string, contextualPlural: boolean): TextRun[] {
    const plural = node.plural === 'always' || (node.plural !== 'never' && contextualPlural);
    const value = this.term(term, node.form ?? 'long', plural);
    return value ? [{ text: value, tag: 'term', variable: node.variable }] : [];
  }
}

/**
 * Walks style nodes for one entry. Rendering is a pure function of the context:
 * the same entry, style, locale, disambiguation settings and cite position always
 * give the same runs.
 */
export const renderNodes = (context: RenderContext, nodes: readonly StyleNode[]): TextRun[] =>
  new StyleInterpreter(context).render(nodes);

/**
 * Renders one entry through a layout. Bibliography entries take the layout's
 * formatting and affixes here; a citation layout wraps the whole event, so the
 * driver applies those once around the joined cites.
 */
export const renderLayout = (context: RenderContext, layout: Layout): TextRun[] => {
  const runs = renderNodes(context, layout.children);
  if (context.mode !== 'bibliography') {
    return runs;
  }

  return wrapAffixes(applyFormatting(runs, layout.formatting), layout);
};
