import type { Logger } from '../core/logger.js';
import { DisambiguationInvariantError } from '../core/errors.js';
import type { CitationOptions } from '../model/style.js';
import type { EntryDisambiguation } from '../render/context.js';
import { mostSpecific, sameDisambiguation } from './state.js';
import type { DisambiguationState } from './state.js';

/** What the engine needs from the driver: renders and ordering for arena entries. */
export interface DisambiguationHost {
  /**
   * Plain-text citation renders used to compare entries, one per position form
   * the style can produce. Entries collide when any form matches.
   */
  renderKeys(entryIndex: number, settings: EntryDisambiguation, omitYearSuffix: boolean): string[];
  /** Largest number of names in any name list of the entry. */
  nameCount(entryIndex: number): number;
  /** Rank of the entry's first citation in the document. */
  firstCitedRank(entryIndex: number): number;
  entryId(entryIndex: number): string;
}

export interface DisambiguationOutcome {
  /** Entries whose settings changed. */
  changed: Set<number>;
  /** Every entry that shares a collision cluster with a newly cited one. */
  touched: Set<number>;
}

type Trial = Map<number, EntryDisambiguation>;

type Keys = ReadonlyMap<number, readonly string[]>;

/**
 * Partitions members into groups linked by a shared non-empty key in the same
 * form. Groups and their members keep the order of `members`.
 */
const linkedGroups = (members: readonly number[], keys: Keys): number[][] => {
  const parent = new Map<number, number>(members.map((member) => [member, member]));
  const find = (member: number): number => {
    let root = member;
    let next = parent.get(root);
    while (next !== undefined && next !== root) {
      root = next;
      next = parent.get(root);
    }
    return root;
  };

  const owners = new Map<string, number>();
  for (const member of members) {
    (keys.get(member) ?? []).forEach((key, form) => {
      if (!key) {
        return;
      }
      const slot = `${form}\u0000${key}`;
      const owner = owners.get(slot);
      if (owner === undefined) {
        owners.set(slot, member);
      } else {
        parent.set(find(member), find(owner));
      }
    });
  }

  const groups = new Map<number, number[]>();
  for (const member of members) {
    const root = find(member);
    groups.set(root, [...(groups.get(root) ?? []), member]);
  }
  return [...groups.values()];
};

/**
 * Resolves rendering collisions between cited entries by escalating the
 * style's techniques: more names, then given names, then either year suffixes
 * (when the style asks for them) or the `disambiguate` condition. Letters are
 * the fallback that always separates what is left.
 */
export class DisambiguationEngine {
  constructor(
    private readonly options: CitationOptions,
    private readonly state: DisambiguationState,
    private readonly host: DisambiguationHost,
    private readonly logger: Logger,
    private readonly maxPasses: number
  ) {}

  update(cited: readonly number[], fresh: readonly number[]): DisambiguationOutcome {
    const outcome: DisambiguationOutcome = { changed: new Set(), touched: new Set() };
    let pending = new Set(fresh);

    for (let pass = 0; pass < this.maxPasses && pending.size > 0; pass += 1) {
      const next = new Set<number>();

      for (const cluster of this.clusters(cited)) {
        if (!cluster.some((entryIndex) => pending.has(entryIndex))) {
          continue;
        }

        cluster.forEach((entryIndex) => outcome.touched.add(entryIndex));
        for (const entryIndex of this.resolve(cluster)) {
          outcome.changed.add(entryIndex);
          next.add(entryIndex);
        }
      }

      pending = next;
    }

    if (pending.size > 0) {
      this.logger.warn('Disambiguation pass limit reached', {
        pending: [...pending].map((entryIndex) => this.host.entryId(entryIndex)),
        maxPasses: this.maxPasses
      });
    }

    this.verify(cited);
    return outcome;
  }

  /** Groups of two or more entries with a matching non-empty render once year suffixes are ignored. */
  private clusters(cited: readonly number[]): number[][] {
    const keys = new Map(
      cited.map((entryIndex) => [entryIndex, this.host.renderKeys(entryIndex, this.state.get(entryIndex), true)])
    );

    return linkedGroups(cited, keys)
      .filter((members) => members.length > 1)
      .map((members) => [...members].sort((a, b) => this.host.firstCitedRank(a) - this.host.firstCitedRank(b)));
  }

  private resolve(cluster: number[]): number[] {
    const trial: Trial = new Map(cluster.map((entryIndex) => [entryIndex, this.state.get(entryIndex)]));

    if (this.options.disambiguateAddNames) {
      this.addNames(cluster, trial);
    }
    if (this.options.disambiguateAddGivenname) {
      this.addGivenNames(cluster, trial);
    }
    if (this.options.disambiguateAddYearSuffix) {
      this.assignYearSuffixes(cluster, trial);
    } else {
      this.tryCondition(cluster, trial);
    }
    this.assignYearSuffixes(cluster, trial);

    const changed: number[] = [];
    for (const entryIndex of cluster) {
      const candidate = trial.get(entryIndex);
      if (candidate && this.state.commit(entryIndex, candidate)) {
        changed.push(entryIndex);
      }
    }

    if (changed.length > 0) {
      this.logger.debug('Disambiguated colliding entries', {
        cluster: cluster.map((entryIndex) => this.host.entryId(entryIndex)),
        changed: changed.map((entryIndex) => this.host.entryId(entryIndex))
      });
    }

    return changed;
  }

  private keys(cluster: readonly number[], trial: Trial): Map<number, string[]> {
    return new Map(
      cluster.map((entryIndex) => [entryIndex, this.host.renderKeys(entryIndex, this.settings(trial, entryIndex), true)])
    );
  }

  private settings(trial: Trial, entryIndex: number): EntryDisambiguation {
    return trial.get(entryIndex) ?? this.state.get(entryIndex);
  }

  /** Distinct renders summed over every position form. */
  private distinctCount(cluster: readonly number[], trial: Trial): number {
    const perForm: Array<Set<string>> = [];
    for (const forms of this.keys(cluster, trial).values()) {
      forms.forEach((key, form) => {
        const seen = perForm[form] ?? new Set<string>();
        seen.add(key);
        perForm[form] = seen;
      });
    }

    return perForm.reduce((total, seen) => total + seen.size, 0);
  }

  /** Groups of members still linked by a shared render. */
  private collisions(cluster: readonly number[], trial: Trial): number[][] {
    return linkedGroups(cluster, this.keys(cluster, trial)).filter((members) => members.length > 1);
  }

  /** Members whose current render is shared with at least one other member. */
  private colliding(cluster: readonly number[], trial: Trial): number[] {
    return this.collisions(cluster, trial).flat();
  }

  /**
   * Applies a change to the colliding members and keeps it only if the cluster
   * ends up with more distinct renders.
   */
  private attempt(
    cluster: readonly number[],
    trial: Trial,
    change: (current: EntryDisambiguation) => EntryDisambiguation
  ): boolean {
    const targets = this.colliding(cluster, trial);
    if (targets.length === 0) {
      return false;
    }

    const candidate: Trial = new Map(trial);
    for (const entryIndex of targets) {
      const current = this.settings(trial, entryIndex);
      candidate.set(entryIndex, mostSpecific(current, change(current)));
    }

    if (targets.every((entryIndex) => sameDisambiguation(this.settings(trial, entryIndex), this.settings(candidate, entryIndex)))) {
      return false;
    }
    if (this.distinctCount(cluster, candidate) <= this.distinctCount(cluster, trial)) {
      return false;
    }

    for (const [entryIndex, settings] of candidate) {
      trial.set(entryIndex, settings);
    }
    return true;
  }

  private maxNames(cluster: readonly number[]): number {
    return Math.max(0, ...cluster.map((entryIndex) => this.host.nameCount(entryIndex)));
  }

  private addNames(cluster: readonly number[], trial: Trial): void {
    const limit = this.maxNames(cluster);
    for (let extra = 1; extra < limit; extra += 1) {
      if (this.colliding(cluster, trial).length === 0) {
        return;
      }
      this.attempt(cluster, trial, (current) => ({ ...current, extraNames: extra }));
    }
  }

  private addGivenNames(cluster: readonly number[], trial: Trial): void {
    const rule = this.options.givennameDisambiguationRule ?? 'by-cite';
    const maxLevel = rule.endsWith('with-initials') ? 1 : 2;
    const slots = rule.startsWith('primary-name') ? 1 : this.maxNames(cluster);

    for (let slot = 0; slot < slots; slot += 1) {
      for (let level = 1; level <= maxLevel; level += 1) {
        if (this.colliding(cluster, trial).length === 0) {
          return;
        }
        this.attempt(cluster, trial, (current) => {
          const levels = [...current.givenNameLevels];
          while (levels.length <= slot) {
            levels.push(0);
          }
          levels[slot] = level;
          return { ...current, givenNameLevels: levels };
        });
      }
    }
  }

  private tryCondition(cluster: readonly number[], trial: Trial): void {
    this.attempt(cluster, trial, (current) => ({ ...current, conditionFlag: true }));
  }

  /**
   * Gives letters to every colliding member that has none, continuing after the
   * highest letter already used among its look-alikes, in first-citation order.
   */
  private assignYearSuffixes(cluster: readonly number[], trial: Trial): void {
    for (const members of this.collisions(cluster, trial)) {
      let next = Math.max(-1, ...members.map((entryIndex) => this.settings(trial, entryIndex).yearSuffix ?? -1)) + 1;
      for (const entryIndex of members) {
        const current = this.settings(trial, entryIndex);
        if (current.yearSuffix === undefined) {
          trial.set(entryIndex, { ...current, yearSuffix: next });
          next += 1;
        }
      }
    }
  }

  private verify(cited: readonly number[]): void {
    const seen = new Map<string, number>();
    for (const entryIndex of cited) {
      this.host.renderKeys(entryIndex, this.state.get(entryIndex), false).forEach((key, form) => {
        if (!key) {
          return;
        }
        const slot = `${form}\u0000${key}`;
        const previous = seen.get(slot);
        if (previous !== undefined) {
          throw new DisambiguationInvariantError([this.host.entryId(previous), this.host.entryId(entryIndex)], key);
        }
        seen.set(slot, entryIndex);
      });
    }
  }
}
