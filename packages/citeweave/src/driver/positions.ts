import type { Position } from '../model/style.js';
import type { CiteContext } from '../render/context.js';
import type { CitationHistory, EventRecord } from './history.js';

export interface PendingCite {
  entryIndex: number;
  locator?: string;
  label?: string;
}

const sameLocator = (previous: PendingCite, current: PendingCite): boolean =>
  previous.locator === current.locator && (previous.label ?? 'page') === (current.label ?? 'page');

/**
 * Locator rules for a cite that repeats the preceding one: a cite without a
 * locator after one with a locator is only subsequent.
 */
const repeatPosition = (previous: PendingCite, current: PendingCite): Position => {
  if (previous.locator === undefined) {
    return current.locator === undefined ? 'ibid' : 'ibid-with-locator';
  }
  if (current.locator === undefined) {
    return 'subsequent';
  }

  return sameLocator(previous, current) ? 'ibid' : 'ibid-with-locator';
};

const noteNumberOf = (event: EventRecord): number => event.noteNumber ?? event.index + 1;

/**
 * The cite a repeat is measured against: the preceding cite in the same event,
 * or for the first cite the last cite of the preceding non-empty event when that
 * event cited nothing but this entry.
 */
const precedingCite = (
  cites: readonly PendingCite[],
  offset: number,
  previousEvent: EventRecord | undefined
): PendingCite | undefined => {
  if (offset > 0) {
    return cites[offset - 1];
  }

  const current = cites[offset];
  if (!previousEvent || !current) {
    return undefined;
  }
  if (!previousEvent.cites.every((cite) => cite.entryIndex === current.entryIndex)) {
    return undefined;
  }

  const last = previousEvent.cites[previousEvent.cites.length - 1];
  return last ? { entryIndex: last.entryIndex, locator: last.item.locator, label: last.item.label } : undefined;
};

/**
 * Positions for the cites of the event about to be appended. `nearNoteDistance`
 * counts events, and an entry repeated within one event is always near.
 */
export const computePositions = (
  history: CitationHistory,
  cites: readonly PendingCite[],
  noteNumber: number | undefined,
  nearNoteDistance: number
): CiteContext[] => {
  const eventIndex = history.eventCount;
  const previousEvent = history.previousNonEmptyEvent();
  const seenInEvent = new Set<number>();

  return cites.map((cite, offset) => {
    const record = history.entry(cite.entryIndex);
    const lastEvent = record.eventIndices[record.eventIndices.length - 1];
    const firstEvent = record.eventIndices[0];
    const repeatedInEvent = seenInEvent.has(cite.entryIndex);
    seenInEvent.add(cite.entryIndex);

    const base: CiteContext = {
      position: 'first',
      nearNote: false,
      citationNumber: record.citationNumber,
      ...(cite.locator !== undefined ? { locator: cite.locator } : {}),
      ...(cite.label !== undefined ? { label: cite.label } : {})
    };

    if (lastEvent === undefined && !repeatedInEvent) {
      return base;
    }

    const distance = repeatedInEvent || lastEvent === undefined ? 0 : eventIndex - lastEvent;
    const firstReferenceNoteNumber =
      firstEvent === undefined ? noteNumber ?? eventIndex + 1 : noteNumberOf(history.event(firstEvent));
    const previous = precedingCite(cites, offset, previousEvent);
    const position =
      previous && previous.entryIndex === cite.entryIndex ? repeatPosition(previous, cite) : 'subsequent';

    return {
      ...base,
      position,
      nearNote: distance <= nearNoteDistance,
      firstReferenceNoteNumber
    };
  });
};
