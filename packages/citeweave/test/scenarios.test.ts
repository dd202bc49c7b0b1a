import { describe, expect, it } from 'vitest';
import { createDriver } from './fixtures/driver.js';
import { makeEntry, person } from './fixtures/entries.js';
import { authorDateStyle, noteStyle } from './fixtures/styles.js';

const smith = person('Smith', 'John');
const e1 = makeEntry('E1', { author: [smith], year: 2020, title: 'Alpha' });
const e2 = makeEntry('E2', { author: [smith], year: 2020, title: 'Beta' });
const e3 = makeEntry('E3', { author: [smith], year: 2020, title: 'Gamma' });

describe('two look-alike entries in an author-date style', () => {
  it('letters both citations and keeps the bibliography in author-title order', () => {
    const driver = createDriver(authorDateStyle(), [e1, e2]);

    expect(driver.appendCitation({ cites: [{ entryId: 'E1' }] }).citation.text).toBe('(Smith, 2020)');

    const second = driver.appendCitation({ cites: [{ entryId: 'E2' }] });
    expect(second.citation.text).toBe('(Smith, 2020b)');
    expect(second.updated.map((event) => event.text)).toEqual(['(Smith, 2020a)']);
    expect(driver.citations().map((event) => event.text)).toEqual(['(Smith, 2020a)', '(Smith, 2020b)']);

    const bibliography = driver.renderBibliography();
    expect(bibliography.items.map((item) => item.entryId)).toEqual(['E1', 'E2']);
    expect(bibliography.items.map((item) => item.text)).toEqual(['Smith, J. (2020a). Alpha.', '——— (2020b). Beta.']);
  });
});

describe('repeated citation in a note style', () => {
  it('renders ibid for the same entry and locator', () => {
    const driver = createDriver(noteStyle(), [e1, e2]);

    expect(driver.appendCitation({ cites: [{ entryId: 'E1', locator: '12' }] }).citation.text).toBe(
      'John Smith, Alpha, 2020, 12.'
    );
    expect(driver.appendCitation({ cites: [{ entryId: 'E1', locator: '12' }] }).citation.text).toBe('Ibid.');
    expect(driver.appendCitation({ cites: [{ entryId: 'E1', locator: '15' }] }).citation.text).toBe('Ibid., 15.');
    expect(driver.appendCitation({ cites: [{ entryId: 'E2' }] }).citation.text).toBe('John Smith, Beta, 2020.');

    const back = driver.appendCitation({ cites: [{ entryId: 'E1' }] }).citation;
    expect(back.text).toBe('Smith, Alpha.');
    expect(back.cites).toEqual([{ entryId: 'E1', citationNumber: 1, position: 'subsequent', nearNote: true }]);
  });
});

describe('a third look-alike arriving later', () => {
  it('re-renders the earlier citations and gives the newcomer the next letter', () => {
    const driver = createDriver(authorDateStyle(), [e1, e2, e3]);
    driver.appendCitation({ cites: [{ entryId: 'E1' }] });
    driver.appendCitation({ cites: [{ entryId: 'E2' }] });

    const third = driver.appendCitation({ cites: [{ entryId: 'E3' }] });

    expect(third.citation.text).toBe('(Smith, 2020c)');
    expect(third.updated.map((event) => [event.eventId, event.text])).toEqual([
      [0, '(Smith, 2020a)'],
      [1, '(Smith, 2020b)']
    ]);
    expect(driver.disambiguationFor('E1')?.yearSuffix).toBe(0);
    expect(driver.disambiguationFor('E2')?.yearSuffix).toBe(1);
    expect(driver.disambiguationFor('E3')?.yearSuffix).toBe(2);
  });
});

describe('rendering properties', () => {
  it('renders the same history identically every time', () => {
    const driver = createDriver(authorDateStyle(), [e1, e2, e3]);
    driver.appendCitations([{ cites: [{ entryId: 'E2' }] }, { cites: [{ entryId: 'E1' }, { entryId: 'E3' }] }]);

    expect(driver.citations()).toEqual(driver.citations());
    expect(driver.renderBibliography()).toEqual(driver.renderBibliography());
  });

  it('keeps first-citation order for entries that sort equal', () => {
    const first = makeEntry('first', { author: [person('Moss', 'Cy')], title: 'Same' });
    const second = makeEntry('second', { author: [person('Moss', 'Cy')], title: 'Same' });
    const driver = createDriver(authorDateStyle(), [first, second]);
    driver.appendCitation({ cites: [{ entryId: 'second' }] });
    driver.appendCitation({ cites: [{ entryId: 'first' }] });

    expect(driver.renderBibliography().items.map((item) => item.entryId)).toEqual(['second', 'first']);
  });
});
