import type { CollationSensitivity } from '../config.js';
import type { Logger } from '../core/logger.js';
import type { Entry, PersonName, StructuredDate } from '../model/entry.js';
import { isEmptyValue, lookupVariable, variableAsString } from '../model/entry.js';
import type { Locale } from '../model/locale.js';
import type { SortKey, Style } from '../model/style.js';
import { text } from '../model/style.js';
import { parseInteger } from '../format/numbers.js';
import { toPlainText } from '../format/runs.js';
import type { EntryDisambiguation } from '../render/context.js';
import { FIRST_CITE } from '../render/context.js';
import { renderNodes } from '../render/interpreter.js';

export interface SortSubject {
  entry: Entry;
  citationNumber: number;
  /** Rank of the first citation; the last tie-breaker. */
  firstCitedRank: number;
  disambiguation: EntryDisambiguation;
}

type SortValue =
  | { kind: 'missing' }
  | { kind: 'names'; names: readonly PersonName[] }
  | { kind: 'date'; date: StructuredDate }
  | { kind: 'number'; value: number }
  | { kind: 'text'; value: string };

const MISSING: SortValue = { kind: 'missing' };

const valueAsString = (value: SortValue): string => {
  switch (value.kind) {
    case 'missing':
      return '';
    case 'names':
      return variableAsString({ kind: 'names', names: value.names });
    case 'date':
      return variableAsString({ kind: 'date', date: value.date });
    case 'number':
      return String(value.value);
    case 'text':
      return value.value;
  }
};

const compareNumbers = (left: number, right: number): number => (left === right ? 0 : left < right ? -1 : 1);

const compareLiteral = (left: string, right: string): number => (left === right ? 0 : left < right ? -1 : 1);

const compareDates = (left: StructuredDate, right: StructuredDate): number =>
  compareNumbers(left.year, right.year) ||
  compareNumbers(left.month ?? 0, right.month ?? 0) ||
  compareNumbers(left.day ?? 0, right.day ?? 0);

/**
 * Orders entries by a style's sort keys. Every key compares with the locale's
 * collation; entries equal on all keys keep their first-citation order.
 */
export class EntrySorter {
  private readonly collator: Intl.Collator;

  constructor(
    private readonly style: Style,
    private readonly locale: Locale,
    sensitivity: CollationSensitivity,
    private readonly logger: Logger
  ) {
    this.collator = new Intl.Collator(locale.lang, { sensitivity });
  }

  sort<T extends SortSubject>(subjects: readonly T[], keys: readonly SortKey[]): T[] {
    const decorated = subjects.map((subject) => ({
      subject,
      values: keys.map((key) => this.valueFor(subject, key))
    }));

    decorated.sort((left, right) => {
      for (const [offset, key] of keys.entries()) {
        const order = this.compareValues(left.values[offset] ?? MISSING, right.values[offset] ?? MISSING, key);
        if (order !== 0) {
          return order;
        }
      }
      return left.subject.firstCitedRank - right.subject.firstCitedRank;
    });

    return decorated.map((item) => item.subject);
  }

  private valueFor(subject: SortSubject, key: SortKey): SortValue {
    if (key.macro) {
      const runs = renderNodes(
        {
          style: this.style,
          locale: this.locale,
          entry: subject.entry,
          mode: 'sort',
          cite: { ...FIRST_CITE, citationNumber: subject.citationNumber },
          disambiguation: subject.disambiguation,
          logger: this.logger
        },
        [text.macro(key.macro)]
      );
      const rendered = toPlainText(runs).trim();
      return rendered ? { kind: 'text', value: rendered } : MISSING;
    }

    if (!key.variable) {
      return MISSING;
    }
    if (key.variable === 'citation-number') {
      return { kind: 'number', value: subject.citationNumber };
    }

    const value = lookupVariable(subject.entry, key.variable);
    if (!value || isEmptyValue(value)) {
      return MISSING;
    }

    switch (value.kind) {
      case 'names':
        return { kind: 'names', names: value.names };
      case 'date':
        return value.date.literal ? { kind: 'text', value: value.date.literal } : { kind: 'date', date: value.date };
      case 'number': {
        const parsed = parseInteger(value.number.value);
        return parsed === null ? { kind: 'text', value: variableAsString(value) } : { kind: 'number', value: parsed };
      }
      default:
        return { kind: 'text', value: variableAsString(value) };
    }
  }

  private compareValues(left: SortValue, right: SortValue, key: SortKey): number {
    if (left.kind === 'missing' || right.kind === 'missing') {
      if (left.kind === right.kind) {
        return 0;
      }
      const missingFirst = key.missing === 'first';
      return left.kind === 'missing' ? (missingFirst ? -1 : 1) : missingFirst ? 1 : -1;
    }

    const order = this.compareTyped(left, right, key);
    return key.direction === 'descending' ? -order : order;
  }

  private compareTyped(
    left: Exclude<SortValue, { kind: 'missing' }>,
    right: Exclude<SortValue, { kind: 'missing' }>,
    key: SortKey
  ): number {
    if (left.kind === 'names' && right.kind === 'names') {
      return this.compareNameLists(left.names, right.names);
    }
    if (left.kind === 'date' && right.kind === 'date') {
      return compareDates(left.date, right.date);
    }
    if (left.kind === 'number' && right.kind === 'number') {
      return compareNumbers(left.value, right.value);
    }
    if (left.kind === 'text' && right.kind === 'text') {
      return this.collator.compare(left.value, right.value);
    }

    this.logger.debug('Sort key type mismatch, comparing as text', {
      key: key.variable ?? key.macro,
      left: left.kind,
      right: right.kind
    });
    return compareLiteral(valueAsString(left), valueAsString(right));
  }

  private familyKey(name: PersonName): string {
    if (name.literal) {
      return name.literal;
    }
    const demoted = (this.style.demoteNonDroppingParticle ?? 'display-and-sort') !== 'never';
    const parts = demoted ? [name.family] : [name.nonDroppingParticle, name.family];
    return parts.filter(Boolean).join(' ');
  }

  private compareNames(left: PersonName, right: PersonName): number {
    return (
      this.collator.compare(this.familyKey(left), this.familyKey(right)) ||
      this.collator.compare(left.given ?? '', right.given ?? '') ||
      this.collator.compare(left.suffix ?? '', right.suffix ?? '')
    );
  }

  private compareNameLists(left: readonly PersonName[], right: readonly PersonName[]): number {
    const shared = Math.min(left.length, right.length);
    for (let index = 0; index < shared; index += 1) {
      const leftName = left[index];
      const rightName = right[index];
      if (leftName && rightName) {
        const order = this.compareNames(leftName, rightName);
        if (order !== 0) {
          return order;
        }
      }
    }

    return compareNumbers(left.length, right.length);
  }
}
