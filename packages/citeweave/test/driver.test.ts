import { describe, expect, it } from 'vitest';
import { InvalidCitationEventError, UnknownEntryError } from '../src/core/errors.js';
import { CitationDriver } from '../src/driver/driver.js';
import { createEntryStore } from '../src/model/entry.js';
import { createDriver } from './fixtures/driver.js';
import { makeEntry, person } from './fixtures/entries.js';
import type { Style, SubstituteRule } from '../src/model/style.js';
import { loadLocale } from './fixtures/locale.js';
import { authorDateStyle, conditionStyle, noteStyle, numericStyle } from './fixtures/styles.js';

const smithAlpha = makeEntry('alpha', { author: [person('Smith', 'John')], year: 2020, title: 'Alpha' });
const smithBeta = makeEntry('beta', { author: [person('Smith', 'John')], year: 2020, title: 'Beta' });
const jonesBrown = makeEntry('jones-brown', {
  author: [person('Jones', 'Ann'), person('Brown', 'Bo'), person('Clark', 'Cy')],
  year: 2019,
  title: 'First'
});
const jonesWhite = makeEntry('jones-white', {
  author: [person('Jones', 'Ann'), person('White', 'Di'), person('Green', 'Ed')],
  year: 2019,
  title: 'Second'
});

describe('CitationDriver disambiguation', () => {
  it('expands given names for authors sharing a family name', () => {
    const adam = makeEntry('adam', { author: [person('Smith', 'Adam')], year: 2021, title: 'One' });
    const beth = makeEntry('beth', { author: [person('Smith', 'Beth')], year: 2021, title: 'Two' });
    const driver = createDriver(
      authorDateStyle({
        disambiguateAddGivenname: true,
        givennameDisambiguationRule: 'by-cite',
        disambiguateAddYearSuffix: true
      }),
      [adam, beth]
    );

    driver.appendCitation({ cites: [{ entryId: 'adam' }] });
    const result = driver.appendCitation({ cites: [{ entryId: 'beth' }] });

    expect(result.citation.text).toBe('(B. Smith, 2021)');
    expect(result.updated.map((event) => event.text)).toEqual(['(A. Smith, 2021)']);
    expect(driver.disambiguationFor('adam')).toEqual({
      extraNames: 0,
      givenNameLevels: [1],
      conditionFlag: false
    });
  });

  it('shows more names before falling back to letters', () => {
    const first = makeEntry('first', {
      author: [person('Jones', 'Ann'), person('Brown', 'Bo'), person('Clark', 'Cy')],
      year: 2019,
      title: 'First'
    });
    const second = makeEntry('second', {
      author: [person('Jones', 'Ann'), person('White', 'Di'), person('Green', 'Ed')],
      year: 2019,
      title: 'Second'
    });
    const driver = createDriver(authorDateStyle({ disambiguateAddNames: true, disambiguateAddYearSuffix: true }), [
      first,
      second
    ]);

    expect(driver.appendCitation({ cites: [{ entryId: 'first' }] }).citation.text).toBe('(Jones et al., 2019)');
    const result = driver.appendCitation({ cites: [{ entryId: 'second' }] });

    expect(result.citation.text).toBe('(Jones, White, et al., 2019)');
    expect(result.updated.map((event) => event.text)).toEqual(['(Jones, Brown, et al., 2019)']);
    expect(driver.disambiguationFor('second')?.yearSuffix).toBeUndefined();
  });

  it('turns on disambiguate branches when the style offers them', () => {
    const driver = createDriver(conditionStyle(), [smithAlpha, smithBeta]);

    expect(driver.appendCitation({ cites: [{ entryId: 'alpha' }] }).citation.text).toBe('(Smith, 2020)');
    const result = driver.appendCitation({ cites: [{ entryId: 'beta' }] });

    expect(result.citation.text).toBe('(Smith, Beta, 2020)');
    expect(result.updated.map((event) => event.text)).toEqual(['(Smith, Alpha, 2020)']);
  });

  it('falls back to year suffixes when no technique is declared', () => {
    const driver = createDriver(authorDateStyle({}), [smithAlpha, smithBeta]);

    driver.appendCitation({ cites: [{ entryId: 'alpha' }] });
    const result = driver.appendCitation({ cites: [{ entryId: 'beta' }] });

    expect(result.citation.text).toBe('(Smith, 2020b)');
    expect(result.updated.map((event) => event.text)).toEqual(['(Smith, 2020a)']);
  });

  it('keeps letters off ibid cites of lettered entries', () => {
    const first = makeEntry('first', { author: [person('Smith', 'John')], year: 2020, title: 'Alpha' });
    const second = makeEntry('second', { author: [person('Smith', 'John')], year: 2020, title: 'Alpha' });
    const driver = createDriver(noteStyle(), [first, second]);

    driver.appendCitations([
      { cites: [{ entryId: 'first', locator: '12' }] },
      { cites: [{ entryId: 'second', locator: '3' }] },
      { cites: [{ entryId: 'second', locator: '3' }] },
      { cites: [{ entryId: 'second', locator: '4' }] },
      { cites: [{ entryId: 'first' }] }
    ]);

    expect(driver.citations().map((event) => event.text)).toEqual([
      'John Smith, Alpha, 2020a, 12.',
      'John Smith, Alpha, 2020b, 3.',
      'Ibid.',
      'Ibid., 4.',
      'Smith, Alpha a.'
    ]);
  });

  it('separates entries that only look alike once later cites shorten their author lists', () => {
    const base = authorDateStyle();
    const style: Style = {
      ...base,
      citation: {
        ...base.citation,
        nameOptions: { etAlMin: 3, etAlUseFirst: 3, etAlSubsequentMin: 3, etAlSubsequentUseFirst: 1 }
      }
    };
    const driver = createDriver(style, [jonesBrown, jonesWhite]);

    driver.appendCitation({ cites: [{ entryId: 'jones-brown' }] });
    const second = driver.appendCitation({ cites: [{ entryId: 'jones-white' }] });
    expect(second.citation.text).toBe('(Jones, White, & Green, 2019b)');
    expect(second.updated.map((event) => event.text)).toEqual(['(Jones, Brown, & Clark, 2019a)']);

    expect(driver.appendCitation({ cites: [{ entryId: 'jones-brown' }] }).citation.text).toBe('(Jones et al., 2019a)');
    expect(driver.appendCitation({ cites: [{ entryId: 'jones-white' }] }).citation.text).toBe('(Jones et al., 2019b)');
  });

  it('adds names to later cites when the style allows it', () => {
    const base = authorDateStyle({ disambiguateAddNames: true });
    const style: Style = {
      ...base,
      citation: {
        ...base.citation,
        nameOptions: { etAlMin: 3, etAlUseFirst: 3, etAlSubsequentMin: 3, etAlSubsequentUseFirst: 1 }
      }
    };
    const driver = createDriver(style, [jonesBrown, jonesWhite]);

    driver.appendCitations([
      { cites: [{ entryId: 'jones-brown' }] },
      { cites: [{ entryId: 'jones-white' }] },
      { cites: [{ entryId: 'jones-brown' }] },
      { cites: [{ entryId: 'jones-white' }] }
    ]);

    expect(driver.citations().map((event) => event.text)).toEqual([
      '(Jones, Brown, & Clark, 2019)',
      '(Jones, White, & Green, 2019)',
      '(Jones, Brown, et al., 2019)',
      '(Jones, White, et al., 2019)'
    ]);
  });

  it('leaves unrelated events alone', () => {
    const other = makeEntry('other', { author: [person('Young', 'Al')], year: 2018, title: 'Other' });
    const driver = createDriver(authorDateStyle(), [smithAlpha, smithBeta, other]);

    driver.appendCitation({ cites: [{ entryId: 'other' }] });
    driver.appendCitation({ cites: [{ entryId: 'alpha' }] });
    const result = driver.appendCitation({ cites: [{ entryId: 'beta' }] });

    expect(result.updated.map((event) => event.eventId)).toEqual([1]);
  });
});

describe('CitationDriver citations', () => {
  it('sorts cites within an event and wraps each in its own affixes', () => {
    const young = makeEntry('young', { author: [person('Young', 'Al')], year: 2019, title: 'Late' });
    const adams = makeEntry('adams', { author: [person('Adams', 'Bo')], year: 2018, title: 'Early' });
    const driver = createDriver(authorDateStyle(), [young, adams, smithAlpha]);

    expect(driver.appendCitation({ cites: [{ entryId: 'young' }, { entryId: 'adams' }] }).citation.text).toBe(
      '(Adams, 2018; Young, 2019)'
    );
    expect(
      driver.appendCitation({ cites: [{ entryId: 'alpha', locator: '5', prefix: 'see ' }] }).citation.text
    ).toBe('(see Smith, 2020, p. 5)');
  });

  it('numbers entries by first citation and collapses runs of three or more', () => {
    const entries = ['A', 'B', 'C', 'D'].map((id) =>
      makeEntry(id, { author: [person(`${id}mes`, 'Ann')], title: `Title ${id}` })
    );
    const driver = createDriver(numericStyle(), entries);

    expect(driver.appendCitation({ cites: [{ entryId: 'A' }] }).citation.text).toBe('[1]');

    const second = driver.appendCitation({
      cites: [{ entryId: 'C' }, { entryId: 'B' }, { entryId: 'D' }, { entryId: 'A' }]
    }).citation;
    expect(second.text).toBe('[1–4]');
    expect(second.cites.map((cite) => [cite.entryId, cite.citationNumber])).toEqual([
      ['A', 1],
      ['C', 2],
      ['B', 3],
      ['D', 4]
    ]);

    expect(driver.appendCitation({ cites: [{ entryId: 'A' }, { entryId: 'C' }] }).citation.text).toBe('[1, 2]');
    expect(driver.appendCitation({ cites: [{ entryId: 'D' }, { entryId: 'A' }, { entryId: 'C' }] }).citation.text).toBe(
      '[1, 2, 4]'
    );

    const bibliography = driver.renderBibliography();
    expect(bibliography.items.map((item) => item.entryId)).toEqual(['A', 'C', 'B', 'D']);
    expect(bibliography.items[0]?.text).toBe('[1] A. Ames, Title A');
  });

  it('renders an event without cites as empty text', () => {
    const driver = createDriver(authorDateStyle(), [smithAlpha]);

    expect(driver.appendCitation({ cites: [] }).citation.text).toBe('');
  });

  it('returns stored events by id', () => {
    const driver = createDriver(authorDateStyle(), [smithAlpha]);
    driver.appendCitation({ position: 4, noteNumber: 2, cites: [{ entryId: 'alpha' }] });

    expect(driver.getCitation(0)).toEqual(driver.citations()[0]);
    expect(driver.getCitation(0)?.noteNumber).toBe(2);
    expect(driver.getCitation(0)?.position).toBe(4);
    expect(driver.getCitation(1)).toBeUndefined();
    expect(driver.disambiguationFor('missing')).toBeUndefined();
  });

  it('hands out copies that cannot change the stored history', () => {
    const driver = createDriver(authorDateStyle(), [smithAlpha]);
    const appended = driver.appendCitation({ cites: [{ entryId: 'alpha' }] }).citation;

    appended.text = 'changed';
    const listed = driver.citations()[0];
    if (listed) {
      listed.runs.length = 0;
      listed.cites[0] = { entryId: 'other', citationNumber: 9, position: 'first', nearNote: false };
    }
    const fetched = driver.getCitation(0);
    if (fetched?.runs[0]) {
      fetched.runs[0].text = 'changed';
    }

    const stored = driver.getCitation(0);
    expect(stored?.text).toBe('(Smith, 2020)');
    expect(stored?.runs.map((run) => run.text).join('')).toBe('(Smith, 2020)');
    expect(stored?.cites.map((cite) => cite.entryId)).toEqual(['alpha']);
  });

  it('returns an empty bibliography for styles without one', () => {
    const driver = createDriver(conditionStyle(), [smithAlpha]);
    driver.appendCitation({ cites: [{ entryId: 'alpha' }] });

    expect(driver.renderBibliography()).toEqual({ items: [], hangingIndent: false });
  });

  it('builds its own config and logger through create', () => {
    const driver = CitationDriver.create(
      { style: authorDateStyle(), locale: loadLocale(), entries: createEntryStore([smithAlpha]) },
      { NODE_ENV: 'test', LOG_LEVEL: 'error' }
    );

    expect(driver.appendCitation({ cites: [{ entryId: 'alpha' }] }).citation.text).toBe('(Smith, 2020)');
  });
});

describe('CitationDriver input errors', () => {
  it('rejects unknown entries without changing state', () => {
    const driver = createDriver(authorDateStyle(), [smithAlpha]);

    expect(() => driver.appendCitation({ cites: [{ entryId: 'alpha' }, { entryId: 'ghost' }] })).toThrow(
      UnknownEntryError
    );
    expect(driver.citations()).toEqual([]);
    expect(driver.disambiguationFor('alpha')).toBeUndefined();

    const result = driver.appendCitation({ cites: [{ entryId: 'alpha' }] });
    expect(result.citation.eventId).toBe(0);
    expect(result.citation.cites[0]?.citationNumber).toBe(1);
  });

  it('rejects malformed events', () => {
    const driver = createDriver(authorDateStyle(), [smithAlpha]);

    expect(() => driver.appendCitation({ cites: [{ entryId: '  ' }] })).toThrow(InvalidCitationEventError);
    expect(() => driver.appendCitation({ position: -1, cites: [] })).toThrow(InvalidCitationEventError);
  });

  it('rejects positions that do not increase', () => {
    const driver = createDriver(authorDateStyle(), [smithAlpha]);
    driver.appendCitation({ position: 10, cites: [{ entryId: 'alpha' }] });

    let caught: unknown;
    try {
      driver.appendCitation({ position: 10, cites: [{ entryId: 'alpha' }] });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InvalidCitationEventError);
    expect(caught).toMatchObject({ details: { position: 10, previousPosition: 10 } });
    expect(driver.citations()).toHaveLength(1);
    expect(driver.appendCitation({ cites: [] }).citation.position).toBe(11);
  });
});

describe('CitationDriver bibliography', () => {
  const coauthored = [
    makeEntry('alpha', { author: [person('Smith', 'John'), person('Jones', 'Ann')], year: 2020, title: 'Alpha' }),
    makeEntry('beta', { author: [person('Smith', 'John'), person('Jones', 'Ann')], year: 2021, title: 'Beta' }),
    makeEntry('gamma', { author: [person('Smith', 'John'), person('Brown', 'Bo')], year: 2022, title: 'Gamma' })
  ];

  const bibliographyTexts = (rule: SubstituteRule): string[] => {
    const base = authorDateStyle();
    const bibliography = base.bibliography ?? { layout: { children: [] } };
    const style: Style = {
      ...base,
      bibliography: {
        ...bibliography,
        options: { subsequentAuthorSubstitute: '———', subsequentAuthorSubstituteRule: rule }
      }
    };
    const driver = createDriver(style, coauthored);
    driver.appendCitation({ cites: [{ entryId: 'alpha' }, { entryId: 'beta' }, { entryId: 'gamma' }] });
    return driver.renderBibliography().items.map((item) => item.text);
  };

  it('substitutes a repeated author list as a whole', () => {
    expect(bibliographyTexts('complete-all')).toEqual([
      'Smith, J., & Brown, B. (2022). Gamma.',
      'Smith, J., & Jones, A. (2020). Alpha.',
      '——— (2021). Beta.'
    ]);
  });

  it('substitutes each name of a repeated author list', () => {
    expect(bibliographyTexts('complete-each')).toEqual([
      'Smith, J., & Brown, B. (2022). Gamma.',
      'Smith, J., & Jones, A. (2020). Alpha.',
      '———, & ——— (2021). Beta.'
    ]);
  });

  it('substitutes leading names that repeat', () => {
    expect(bibliographyTexts('partial-each')).toEqual([
      'Smith, J., & Brown, B. (2022). Gamma.',
      '———, & Jones, A. (2020). Alpha.',
      '———, & ——— (2021). Beta.'
    ]);
    expect(bibliographyTexts('partial-first')).toEqual([
      'Smith, J., & Brown, B. (2022). Gamma.',
      '———, & Jones, A. (2020). Alpha.',
      '———, & Jones, A. (2021). Beta.'
    ]);
  });

  it('reports the hanging indent option', () => {
    const base = authorDateStyle();
    const bibliography = base.bibliography ?? { layout: { children: [] } };
    const style: Style = { ...base, bibliography: { ...bibliography, options: { hangingIndent: true } } };
    const driver = createDriver(style, coauthored);
    driver.appendCitation({ cites: [{ entryId: 'alpha' }] });

    expect(driver.renderBibliography()).toMatchObject({
      hangingIndent: true,
      items: [{ entryId: 'alpha', text: 'Smith, J., & Jones, A. (2020). Alpha.' }]
    });
  });
});
