import type { ConfigOverrides, EngineConfig } from '../config.js';
import { parseConfig } from '../config.js';
import { InvalidCitationEventError, UnknownEntryError } from '../core/errors.js';
import { Logger } from '../core/logger.js';
import { DisambiguationEngine } from '../disambiguation/engine.js';
import type { DisambiguationHost } from '../disambiguation/engine.js';
import { DisambiguationState } from '../disambiguation/state.js';
import type { Entry, EntryStore } from '../model/entry.js';
import type { Locale } from '../model/locale.js';
import { citationEventSchema } from '../model/schemas.js';
import type { CitationEventInput, CiteItem } from '../model/schemas.js';
import type { Position, Style, SubstituteRule } from '../model/style.js';
import {
  applyFormatting,
  hasText,
  joinWithDelimiter,
  normalizePunctuation,
  punctuation,
  toPlainText,
  wrapAffixes
} from '../format/runs.js';
import type { TextRun } from '../format/runs.js';
import type { CiteContext, EntryDisambiguation } from '../render/context.js';
import { FIRST_CITE } from '../render/context.js';
import { renderLayout } from '../render/interpreter.js';
import { EntrySorter } from '../sort/sorter.js';
import type { SortSubject } from '../sort/sorter.js';
import { CitationHistory } from './history.js';
import type { CiteRecord, EntryRecord, EventRecord, RenderedEvent } from './history.js';
import { computePositions } from './positions.js';

export interface EngineSession {
  style: Style;
  locale: Locale;
  entries: EntryStore;
}

export interface AppendResult {
  citation: RenderedEvent;
  /** Earlier events re-rendered because disambiguation touched their entries. */
  updated: RenderedEvent[];
}

export interface BibliographyItem {
  entryId: string;
  citationNumber: number;
  runs: TextRun[];
  text: string;
}

export interface Bibliography {
  items: BibliographyItem[];
  /** Layout hint from the style: every line after an item's first is indented. */
  hangingIndent: boolean;
}

interface SortableCite extends SortSubject {
  record: EntryRecord;
  item: CiteItem;
}

const EN_DASH = '–';

/** Cite forms compared for collisions; ibid forms repeat the previous cite and never tell entries apart. */
const AMBIGUITY_POSITIONS: readonly Position[] = ['first', 'subsequent'];

const countNames = (entry: Entry): number =>
  Math.max(0, ...Object.values(entry.variables).map((value) => (value.kind === 'names' ? value.names.length : 0)));

/** The cite's runs when they hold nothing but its citation number. */
const bareCitationNumber = (runs: readonly TextRun[]): number | undefined => {
  const visible = runs.filter((run) => run.text.length > 0);
  const [only] = visible;
  if (visible.length !== 1 || only?.tag !== 'citation-number') {
    return undefined;
  }

  const value = Number(only.text);
  return Number.isInteger(value) ? value : undefined;
};

/**
 * Collapses runs of three or more consecutive citation numbers into a range,
 * as in `1–3, 5`.
 */
const collapseNumbers = (parts: readonly TextRun[][], delimiter: string): TextRun[] | undefined => {
  const numbers = parts.map(bareCitationNumber);
  const values: number[] = [];
  for (const value of numbers) {
    if (value === undefined) {
      return undefined;
    }
    values.push(value);
  }

  const groups: TextRun[][] = [];
  let start = 0;
  while (start < values.length) {
    let end = start;
    while (end + 1 < values.length && values[end + 1] === (values[end] ?? 0) + 1) {
      end += 1;
    }

    const first = parts[start] ?? [];
    const last = parts[end] ?? [];
    if (end - start >= 2) {
      groups.push([...first, punctuation(EN_DASH), ...last]);
    } else {
      groups.push(...parts.slice(start, end + 1));
    }
    start = end + 1;
  }

  return joinWithDelimiter(groups, delimiter);
};

/** Callers get copies; the stored history only changes through appends. */
const snapshot = (event: RenderedEvent): RenderedEvent => structuredClone(event);

interface RunSpan {
  start: number;
  end: number;
}

interface AuthorSpan extends RunSpan {
  variable?: string;
  /** One span per rendered name, without the delimiters between them. */
  names: RunSpan[];
}

interface RenderedAuthors {
  text: string;
  names: string[];
}

/** Runs of the first rendered name list: from its first name run to its last run. */
const authorSpan = (runs: readonly TextRun[]): AuthorSpan | undefined => {
  const start = runs.findIndex((run) => run.tag === 'name');
  const first = runs[start];
  if (start < 0 || !first) {
    return undefined;
  }

  let end = start + 1;
  for (let index = start + 1; index < runs.length; index += 1) {
    if (runs[index]?.variable === first.variable) {
      end = index + 1;
    }
  }

  const names: RunSpan[] = [];
  for (let index = start; index < end; index += 1) {
    const run = runs[index];
    if (run?.tag !== 'name' || run.variable !== first.variable) {
      continue;
    }
    const last = names[names.length - 1];
    if (last && last.end === index) {
      last.end = index + 1;
    } else {
      names.push({ start: index, end: index + 1 });
    }
  }

  return { start, end, names, ...(first.variable !== undefined ? { variable: first.variable } : {}) };
};

/** Replaces the given spans, in order, with the substitute text. */
const replaceSpans = (
  runs: readonly TextRun[],
  spans: readonly RunSpan[],
  substitute: string,
  variable: string | undefined
): TextRun[] => {
  const output: TextRun[] = [];
  let cursor = 0;
  for (const span of spans) {
    output.push(...runs.slice(cursor, span.start));
    if (substitute) {
      output.push({ text: substitute, tag: 'name', variable });
    }
    cursor = span.end;
  }
  output.push(...runs.slice(cursor));
  return output;
};

/**
 * Applies `subsequentAuthorSubstitute` against the previous item's authors. The
 * complete rules need the whole list to match; the partial rules replace
 * leading names that match one by one.
 */
const substituteAuthors = (
  runs: TextRun[],
  span: AuthorSpan,
  current: RenderedAuthors,
  previous: RenderedAuthors | undefined,
  substitute: string,
  rule: SubstituteRule
): TextRun[] => {
  if (!previous) {
    return runs;
  }

  switch (rule) {
    case 'complete-all':
      return current.text === previous.text ? replaceSpans(runs, [span], substitute, span.variable) : runs;
    case 'complete-each':
      return current.text === previous.text ? replaceSpans(runs, span.names, substitute, span.variable) : runs;
    case 'partial-each': {
      const matching = span.names.filter((_, index) =>
        current.names.slice(0, index + 1).every((name, offset) => name === previous.names[offset])
      );
      return replaceSpans(runs, matching, substitute, span.variable);
    }
    case 'partial-first': {
      const [first] = span.names;
      return first && current.names[0] === previous.names[0]
        ? replaceSpans(runs, [first], substitute, span.variable)
        : runs;
    }
  }
};

/**
 * Processes citation events in document order. Owns the entry arena, the event
 * history and the disambiguation state; every append re-renders exactly the
 * events whose entries the disambiguation engine touched.
 */
export class CitationDriver {
  private readonly history = new CitationHistory();
  private readonly state = new DisambiguationState();
  private readonly engine: DisambiguationEngine;
  private readonly sorter: EntrySorter;
  private readonly nearNoteDistance: number;

  constructor(
    private readonly session: EngineSession,
    config: EngineConfig,
    private readonly logger: Logger
  ) {
    const options = session.style.citation.options ?? {};
    this.nearNoteDistance = options.nearNoteDistance ?? config.nearNoteDistance;
    this.sorter = new EntrySorter(
      session.style,
      session.locale,
      config.collationSensitivity,
      logger.child({ component: 'sorter' })
    );
    this.engine = new DisambiguationEngine(
      options,
      this.state,
      this.host(),
      logger.child({ component: 'disambiguation' }),
      config.maxDisambiguationPasses
    );
  }

  static create(session: EngineSession, overrides?: ConfigOverrides): CitationDriver {
    const config = parseConfig(overrides);
    return new CitationDriver(session, config, new Logger(config.logLevel));
  }

  appendCitation(input: CitationEventInput): AppendResult {
    const parsed = citationEventSchema.safeParse(input);
    if (!parsed.success) {
      throw new InvalidCitationEventError('Invalid citation event', {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      });
    }

    const event = parsed.data;
    const lastPosition = this.history.lastPosition();
    const position = event.position ?? (lastPosition === undefined ? 0 : lastPosition + 1);
    if (lastPosition !== undefined && position <= lastPosition) {
      throw new InvalidCitationEventError('Citation event positions must increase', {
        position,
        previousPosition: lastPosition
      });
    }

    const resolved = event.cites.map((item) => {
      const entry = this.session.entries.get(item.entryId);
      if (!entry) {
        throw new UnknownEntryError(item.entryId);
      }
      return { entry, item };
    });

    const fresh: number[] = [];
    const cites: SortableCite[] = resolved.map(({ entry, item }) => {
      const registered = this.history.register(entry);
      if (registered.fresh) {
        fresh.push(registered.record.index);
      }
      return this.sortable(registered.record, item);
    });

    const ordered = this.sortCites(cites);
    const contexts = computePositions(
      this.history,
      ordered.map(({ record, item }) => ({
        entryIndex: record.index,
        ...(item.locator !== undefined ? { locator: item.locator } : {}),
        ...(item.label !== undefined ? { label: item.label } : {})
      })),
      event.noteNumber,
      this.nearNoteDistance
    );

    const records: CiteRecord[] = ordered.map(({ record, item }, offset) => ({
      entryIndex: record.index,
      item,
      context: contexts[offset] ?? { ...FIRST_CITE, citationNumber: record.citationNumber }
    }));
    const appended = this.history.appendEvent(position, event.noteNumber, records);

    const cited = this.history.entries().map((record) => record.index);
    const outcome = this.engine.update(cited, fresh);
    const flagged = this.history.markEntriesDirty(new Set([...outcome.touched, ...outcome.changed]));

    this.logger.debug('Citation event appended', {
      eventId: appended.index,
      position,
      cites: records.map((record) => this.history.entry(record.entryIndex).entry.id),
      reRendered: flagged.length
    });

    const updated: RenderedEvent[] = [];
    let citation: RenderedEvent | undefined;
    for (const record of this.history.dirtyEvents()) {
      const rendered = this.renderEvent(record);
      if (record.index === appended.index) {
        citation = rendered;
      } else {
        updated.push(rendered);
      }
    }

    return { citation: snapshot(citation ?? this.renderEvent(appended)), updated: updated.map(snapshot) };
  }

  /** Appends events in order; the result for each mirrors `appendCitation`. */
  appendCitations(inputs: readonly CitationEventInput[]): AppendResult[] {
    return inputs.map((input) => this.appendCitation(input));
  }

  getCitation(eventId: number): RenderedEvent | undefined {
    if (eventId < 0 || eventId >= this.history.eventCount) {
      return undefined;
    }

    const record = this.history.event(eventId);
    return snapshot(record.rendered ?? this.renderEvent(record));
  }

  citations(): RenderedEvent[] {
    return this.history.events().map((record) => snapshot(record.rendered ?? this.renderEvent(record)));
  }

  /** Current disambiguation settings of a cited entry. */
  disambiguationFor(entryId: string): EntryDisambiguation | undefined {
    const record = this.history.findEntry(entryId);
    return record ? this.state.get(record.index) : undefined;
  }

  renderBibliography(): Bibliography {
    const { style, locale } = this.session;
    const bibliography = style.bibliography;
    if (!bibliography) {
      return { items: [], hangingIndent: false };
    }

    const subjects = this.history.entries().map((record) => this.subject(record));
    const sorted = this.sorter.sort(subjects, bibliography.sort ?? []);
    const substitute = bibliography.options?.subsequentAuthorSubstitute;
    const rule = bibliography.options?.subsequentAuthorSubstituteRule ?? 'complete-all';

    let previousAuthors: RenderedAuthors | undefined;
    const items = sorted.map((subject): BibliographyItem => {
      let runs = renderLayout(
        {
          style,
          locale,
          entry: subject.entry,
          mode: 'bibliography',
          cite: { ...FIRST_CITE, citationNumber: subject.citationNumber },
          disambiguation: subject.disambiguation,
          logger: this.logger
        },
        bibliography.layout
      );

      if (substitute !== undefined) {
        const span = authorSpan(runs);
        const authors = span
          ? {
              text: toPlainText(runs.slice(span.start, span.end)),
              names: span.names.map((name) => toPlainText(runs.slice(name.start, name.end)))
            }
          : undefined;
        if (span && authors) {
          runs = substituteAuthors(runs, span, authors, previousAuthors, substitute, rule);
        }
        previousAuthors = authors;
      }

      runs = normalizePunctuation(runs, { punctuationInQuote: locale.options?.punctuationInQuote ?? false });
      return {
        entryId: subject.entry.id,
        citationNumber: subject.citationNumber,
        runs,
        text: toPlainText(runs)
      };
    });

    return { items, hangingIndent: bibliography.options?.hangingIndent ?? false };
  }

  private subject(record: EntryRecord): SortSubject {
    return {
      entry: record.entry,
      citationNumber: record.citationNumber,
      firstCitedRank: record.citationNumber,
      disambiguation: this.state.get(record.index)
    };
  }

  private sortable(record: EntryRecord, item: CiteItem): SortableCite {
    return { ...this.subject(record), record, item };
  }

  private sortCites(cites: SortableCite[]): SortableCite[] {
    const keys = this.session.style.citation.sort;
    if (!keys || keys.length === 0 || cites.length < 2) {
      return cites;
    }

    // Ties keep the order the caller gave.
    const withOrder = cites.map((cite, offset) => ({ ...cite, firstCitedRank: offset }));
    return this.sorter.sort(withOrder, keys);
  }

  private renderCite(
    entryIndex: number,
    cite: CiteContext,
    disambiguation: EntryDisambiguation,
    omitYearSuffix: boolean
  ): TextRun[] {
    const { style, locale } = this.session;
    return renderLayout(
      {
        style,
        locale,
        entry: this.history.entry(entryIndex).entry,
        mode: 'citation',
        cite,
        disambiguation,
        omitYearSuffix,
        logger: this.logger
      },
      style.citation.layout
    );
  }

  private renderEvent(record: EventRecord): RenderedEvent {
    const { style, locale } = this.session;
    const layout = style.citation.layout;
    const options = style.citation.options ?? {};

    const parts = record.cites.map((cite) =>
      wrapAffixes(this.renderCite(cite.entryIndex, cite.context, this.state.get(cite.entryIndex), false), {
        prefix: cite.item.prefix,
        suffix: cite.item.suffix
      })
    );

    const delimiter = layout.delimiter ?? '';
    const collapsed =
      options.collapse === 'citation-number'
        ? collapseNumbers(parts, options.afterCollapseDelimiter ?? delimiter)
        : undefined;
    const joined = collapsed ?? joinWithDelimiter(parts, delimiter);
    const wrapped = hasText(joined) ? wrapAffixes(applyFormatting(joined, layout.formatting), layout) : [];
    const runs = normalizePunctuation(wrapped, { punctuationInQuote: locale.options?.punctuationInQuote ?? false });

    const rendered: RenderedEvent = {
      eventId: record.index,
      position: record.position,
      ...(record.noteNumber !== undefined ? { noteNumber: record.noteNumber } : {}),
      cites: record.cites.map((cite) => ({
        entryId: this.history.entry(cite.entryIndex).entry.id,
        citationNumber: cite.context.citationNumber ?? this.history.entry(cite.entryIndex).citationNumber,
        position: cite.context.position,
        nearNote: cite.context.nearNote
      })),
      runs,
      text: toPlainText(runs)
    };

    record.rendered = rendered;
    record.dirty = false;
    return rendered;
  }

  private host(): DisambiguationHost {
    return {
      renderKeys: (entryIndex, settings, omitYearSuffix) =>
        AMBIGUITY_POSITIONS.map((position) => {
          const cite: CiteContext = {
            position,
            nearNote: false,
            citationNumber: this.history.entry(entryIndex).citationNumber
          };
          return toPlainText(this.renderCite(entryIndex, cite, settings, omitYearSuffix));
        }),
      nameCount: (entryIndex) => countNames(this.history.entry(entryIndex).entry),
      firstCitedRank: (entryIndex) => this.history.entry(entryIndex).citationNumber,
      entryId: (entryIndex) => this.history.entry(entryIndex).entry.id
    };
  }
}
