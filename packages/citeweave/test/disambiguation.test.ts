import { describe, expect, it } from 'vitest';
import { DisambiguationInvariantError } from '../src/core/errors.js';
import { Logger } from '../src/core/logger.js';
import { DisambiguationEngine } from '../src/disambiguation/engine.js';
import type { DisambiguationHost } from '../src/disambiguation/engine.js';
import { DisambiguationState, mostSpecific, sameDisambiguation } from '../src/disambiguation/state.js';
import type { EntryDisambiguation } from '../src/render/context.js';
import { EMPTY_DISAMBIGUATION, yearSuffixLetter } from '../src/render/context.js';

/** Renders fixed strings per entry and form, plus the year-suffix letter when asked. */
class FixedRenderHost implements DisambiguationHost {
  constructor(
    readonly forms: string[][],
    private readonly printsSuffix = true
  ) {}

  renderKeys(entryIndex: number, settings: EntryDisambiguation, omitYearSuffix: boolean): string[] {
    return (this.forms[entryIndex] ?? []).map((base) => {
      if (omitYearSuffix || !this.printsSuffix || settings.yearSuffix === undefined || !base) {
        return base;
      }
      return `${base}${yearSuffixLetter(settings.yearSuffix)}`;
    });
  }

  nameCount(): number {
    return 1;
  }

  firstCitedRank(entryIndex: number): number {
    return entryIndex;
  }

  entryId(entryIndex: number): string {
    return `entry-${entryIndex}`;
  }
}

const createEngine = (host: DisambiguationHost, maxPasses = 8, logger = new Logger('error')) => {
  const state = new DisambiguationState();
  return { state, engine: new DisambiguationEngine({}, state, host, logger, maxPasses) };
};

describe('DisambiguationEngine', () => {
  it('letters look-alikes in first-citation order and leaves others alone', () => {
    const host = new FixedRenderHost([['Smith 2020'], ['Smith 2020'], ['Jones 2020']]);
    const { state, engine } = createEngine(host);

    const outcome = engine.update([0, 1, 2], [0, 1, 2]);

    expect([...outcome.changed]).toEqual([0, 1]);
    expect([...outcome.touched]).toEqual([0, 1]);
    expect(state.get(0).yearSuffix).toBe(0);
    expect(state.get(1).yearSuffix).toBe(1);
    expect(state.get(2)).toBe(EMPTY_DISAMBIGUATION);
  });

  it('continues lettering after the highest letter in use', () => {
    const host = new FixedRenderHost([['Smith 2020'], ['Smith 2020']]);
    const { state, engine } = createEngine(host);
    engine.update([0, 1], [0, 1]);

    host.forms.push(['Smith 2020']);
    const outcome = engine.update([0, 1, 2], [2]);

    expect([...outcome.changed]).toEqual([2]);
    expect([...outcome.touched]).toEqual([0, 1, 2]);
    expect([0, 1, 2].map((entryIndex) => state.get(entryIndex).yearSuffix)).toEqual([0, 1, 2]);
  });

  it('separates entries that only match in a later form', () => {
    const host = new FixedRenderHost([
      ['Jones, Brown 2019', 'Jones 2019'],
      ['Jones, White 2019', 'Jones 2019'],
      ['Lee 2019', 'Lee 2019']
    ]);
    const { state, engine } = createEngine(host);

    const outcome = engine.update([0, 1, 2], [0, 1, 2]);

    expect([...outcome.changed]).toEqual([0, 1]);
    expect([0, 1].map((entryIndex) => host.renderKeys(entryIndex, state.get(entryIndex), false))).toEqual([
      ['Jones, Brown 2019a', 'Jones 2019a'],
      ['Jones, White 2019b', 'Jones 2019b']
    ]);
    expect(state.get(2)).toBe(EMPTY_DISAMBIGUATION);
  });

  it('ignores entries that render nothing', () => {
    const { state, engine } = createEngine(new FixedRenderHost([[''], ['']]));

    const outcome = engine.update([0, 1], [0, 1]);

    expect(outcome.changed.size).toBe(0);
    expect(state.get(0)).toBe(EMPTY_DISAMBIGUATION);
    expect(state.get(1)).toBe(EMPTY_DISAMBIGUATION);
  });

  it('throws when letters cannot separate two entries', () => {
    const { engine } = createEngine(new FixedRenderHost([['Smith 2020'], ['Smith 2020']], false));

    expect(() => engine.update([0, 1], [0, 1])).toThrow(DisambiguationInvariantError);
  });

  it('warns when the pass limit stops further passes', () => {
    const lines: string[] = [];
    const logger = new Logger('warn', (line) => lines.push(line));
    const { engine } = createEngine(new FixedRenderHost([['Smith 2020'], ['Smith 2020']]), 1, logger);

    engine.update([0, 1], [0, 1]);

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({
      level: 'warn',
      message: 'Disambiguation pass limit reached',
      context: { pending: ['entry-0', 'entry-1'], maxPasses: 1 }
    });
  });
});

describe('DisambiguationState', () => {
  it('never makes an entry less specific', () => {
    const state = new DisambiguationState();

    expect(state.commit(0, { extraNames: 2, givenNameLevels: [1], yearSuffix: 3, conditionFlag: true })).toBe(true);
    expect(state.commit(0, { extraNames: 1, givenNameLevels: [0, 2], yearSuffix: 0, conditionFlag: false })).toBe(true);
    expect(state.get(0)).toEqual({ extraNames: 2, givenNameLevels: [1, 2], yearSuffix: 3, conditionFlag: true });
    expect(state.commit(0, EMPTY_DISAMBIGUATION)).toBe(false);
  });

  it('treats trailing zero given-name levels as absent', () => {
    const base = { extraNames: 0, conditionFlag: false };

    expect(sameDisambiguation({ ...base, givenNameLevels: [1, 0] }, { ...base, givenNameLevels: [1] })).toBe(true);
    expect(sameDisambiguation({ ...base, givenNameLevels: [0, 1] }, { ...base, givenNameLevels: [1] })).toBe(false);
  });

  it('keeps the first year suffix when merging', () => {
    const merged = mostSpecific({ ...EMPTY_DISAMBIGUATION, yearSuffix: 1 }, { ...EMPTY_DISAMBIGUATION, yearSuffix: 4 });

    expect(merged.yearSuffix).toBe(1);
  });
});
