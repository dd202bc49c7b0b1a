export { CitationDriver } from './driver/driver.js';
export type { AppendResult, Bibliography, BibliographyItem, EngineSession } from './driver/driver.js';
export type { RenderedCite, RenderedEvent } from './driver/history.js';

export { parseConfig } from './config.js';
export type { CollationSensitivity, ConfigOverrides, EngineConfig } from './config.js';
export { Logger } from './core/logger.js';
export type { LogLevel, LogSink } from './core/logger.js';
export {
  CiteweaveError,
  DisambiguationInvariantError,
  InvalidCitationEventError,
  UnknownEntryError
} from './core/errors.js';
export { getEngineInfo } from './version.js';
export type { EngineInfo } from './version.js';

export { createEntryStore, lookupVariable, parseFormattable, plain } from './model/entry.js';
export type {
  DateParts,
  Entry,
  EntryStore,
  EntryType,
  FormattableString,
  NumberWithAffix,
  PersonName,
  Season,
  Span,
  StructuredDate,
  VariableValue
} from './model/entry.js';
export { lookupTerm } from './model/locale.js';
export type { Locale, LocaleDateFormat, TermEntry, TermForm, TermOverrides, TermValue } from './model/locale.js';
export { LOCATOR_LABELS, citationEventSchema, citeItemSchema } from './model/schemas.js';
export type { CitationEventInput, CiteItem, LocatorLabel } from './model/schemas.js';
export { choose, date, group, label, names, number, text, when } from './model/style.js';
export type * from './model/style.js';

export { applyTextCase } from './format/case.js';
export { toPlainText, normalizePunctuation } from './format/runs.js';
export type { RunTag, TextRun } from './format/runs.js';
export { renderLayout, renderNodes } from './render/interpreter.js';
export type { CiteContext, EntryDisambiguation, RenderContext, RenderMode } from './render/context.js';
