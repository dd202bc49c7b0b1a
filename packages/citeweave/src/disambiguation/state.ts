import type { EntryDisambiguation } from '../render/context.js';
import { EMPTY_DISAMBIGUATION } from '../render/context.js';

const levelsCovering = (current: readonly number[], next: readonly number[]): number[] => {
  const length = Math.max(current.length, next.length);
  return Array.from({ length }, (_, index) => Math.max(current[index] ?? 0, next[index] ?? 0));
};

/**
 * Merges two settings keeping the more specific value of each field, so that
 * committing a candidate can never make an entry less specific.
 */
export const mostSpecific = (current: EntryDisambiguation, next: EntryDisambiguation): EntryDisambiguation => ({
  extraNames: Math.max(current.extraNames, next.extraNames),
  givenNameLevels: levelsCovering(current.givenNameLevels, next.givenNameLevels),
  yearSuffix: current.yearSuffix ?? next.yearSuffix,
  conditionFlag: current.conditionFlag || next.conditionFlag
});

const levelKey = (levels: readonly number[]): string => {
  let end = levels.length;
  while (end > 0 && (levels[end - 1] ?? 0) === 0) {
    end -= 1;
  }
  return levels.slice(0, end).join(',');
};

export const sameDisambiguation = (left: EntryDisambiguation, right: EntryDisambiguation): boolean =>
  left.extraNames === right.extraNames &&
  left.yearSuffix === right.yearSuffix &&
  left.conditionFlag === right.conditionFlag &&
  levelKey(left.givenNameLevels) === levelKey(right.givenNameLevels);

/**
 * Per-session disambiguation settings keyed by entry arena index. Values only
 * ever grow: a year suffix, once given, is never replaced.
 */
export class DisambiguationState {
  private readonly byEntry = new Map<number, EntryDisambiguation>();

  get(entryIndex: number): EntryDisambiguation {
    return this.byEntry.get(entryIndex) ?? EMPTY_DISAMBIGUATION;
  }

  /** Returns true when the stored value changed. */
  commit(entryIndex: number, candidate: EntryDisambiguation): boolean {
    const current = this.get(entryIndex);
    const merged = mostSpecific(current, candidate);
    if (sameDisambiguation(current, merged)) {
      return false;
    }

    this.byEntry.set(entryIndex, merged);
    return true;
  }
}
