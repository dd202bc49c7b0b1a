import { CiteweaveError } from '../core/errors.js';
import type { Entry } from '../model/entry.js';
import type { CiteItem } from '../model/schemas.js';
import type { CiteContext } from '../render/context.js';
import type { TextRun } from '../format/runs.js';

export interface EntryRecord {
  index: number;
  entry: Entry;
  /** First-seen ordinal, starting at 1. Doubles as the first-citation rank. */
  citationNumber: number;
  /** Events citing this entry, in document order. */
  eventIndices: number[];
}

export interface CiteRecord {
  entryIndex: number;
  item: CiteItem;
  context: CiteContext;
}

export interface RenderedCite {
  entryId: string;
  citationNumber: number;
  position: CiteContext['position'];
  nearNote: boolean;
}

export interface RenderedEvent {
  /** Arena index of the event, starting at 0. */
  eventId: number;
  position: number;
  noteNumber?: number;
  cites: RenderedCite[];
  runs: TextRun[];
  text: string;
}

export interface EventRecord {
  index: number;
  position: number;
  noteNumber?: number;
  cites: CiteRecord[];
  rendered?: RenderedEvent;
  dirty: boolean;
}

/**
 * Append-only arena of cited entries and citation events. Everything refers to
 * entries and events by index; re-rendering is driven by the dirty flags.
 */
export class CitationHistory {
  private readonly entryRecords: EntryRecord[] = [];
  private readonly indexById = new Map<string, number>();
  private readonly eventRecords: EventRecord[] = [];

  get eventCount(): number {
    return this.eventRecords.length;
  }

  lastPosition(): number | undefined {
    return this.eventRecords[this.eventRecords.length - 1]?.position;
  }

  findEntry(id: string): EntryRecord | undefined {
    const index = this.indexById.get(id);
    return index === undefined ? undefined : this.entryRecords[index];
  }

  /** Returns the entry's record and whether this is its first citation. */
  register(entry: Entry): { record: EntryRecord; fresh: boolean } {
    const existing = this.findEntry(entry.id);
    if (existing) {
      return { record: existing, fresh: false };
    }

    const record: EntryRecord = {
      index: this.entryRecords.length,
      entry,
      citationNumber: this.entryRecords.length + 1,
      eventIndices: []
    };
    this.entryRecords.push(record);
    this.indexById.set(entry.id, record.index);

    return { record, fresh: true };
  }

  entry(index: number): EntryRecord {
    const record = this.entryRecords[index];
    if (!record) {
      throw new CiteweaveError('Entry index out of range', { index });
    }
    return record;
  }

  entries(): readonly EntryRecord[] {
    return this.entryRecords;
  }

  event(index: number): EventRecord {
    const record = this.eventRecords[index];
    if (!record) {
      throw new CiteweaveError('Event index out of range', { index });
    }
    return record;
  }

  events(): readonly EventRecord[] {
    return this.eventRecords;
  }

  /** The most recent event with at least one cite. */
  previousNonEmptyEvent(): EventRecord | undefined {
    for (let index = this.eventRecords.length - 1; index >= 0; index -= 1) {
      const record = this.eventRecords[index];
      if (record && record.cites.length > 0) {
        return record;
      }
    }
    return undefined;
  }

  appendEvent(position: number, noteNumber: number | undefined, cites: CiteRecord[]): EventRecord {
    const record: EventRecord = {
      index: this.eventRecords.length,
      position,
      ...(noteNumber !== undefined ? { noteNumber } : {}),
      cites,
      dirty: true
    };
    this.eventRecords.push(record);

    for (const cite of cites) {
      const entry = this.entry(cite.entryIndex);
      if (entry.eventIndices[entry.eventIndices.length - 1] !== record.index) {
        entry.eventIndices.push(record.index);
      }
    }

    return record;
  }

  /** Flags every event citing one of the entries; returns the newly flagged event indices. */
  markEntriesDirty(entryIndices: Iterable<number>): number[] {
    const flagged: number[] = [];
    for (const entryIndex of entryIndices) {
      for (const eventIndex of this.entry(entryIndex).eventIndices) {
        const record = this.event(eventIndex);
        if (!record.dirty) {
          record.dirty = true;
          flagged.push(eventIndex);
        }
      }
    }

    return flagged.sort((a, b) => a - b);
  }

  dirtyEvents(): EventRecord[] {
    return this.eventRecords.filter((record) => record.dirty);
  }
}
