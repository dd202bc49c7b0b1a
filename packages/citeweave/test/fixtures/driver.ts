import { parseConfig } from '../../src/config.js';
import { Logger } from '../../src/core/logger.js';
import { CitationDriver } from '../../src/driver/driver.js';
import type { Entry } from '../../src/model/entry.js';
import { createEntryStore } from '../../src/model/entry.js';
import type { Style } from '../../src/model/style.js';
import { loadLocale } from './locale.js';

export const createDriver = (style: Style, entries: Entry[], logger = new Logger('error')): CitationDriver =>
  new CitationDriver(
    { style, locale: loadLocale(), entries: createEntryStore(entries) },
    parseConfig({ NODE_ENV: 'test', LOG_LEVEL: 'error' }),
    logger
  );
