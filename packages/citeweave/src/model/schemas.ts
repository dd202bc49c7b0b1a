import { z } from 'zod';

export const LOCATOR_LABELS = [
  'act',
  'appendix',
  'article-locator',
  'book',
  'canon',
  'chapter',
  'column',
  'elocation',
  'equation',
  'figure',
  'folio',
  'issue',
  'line',
  'note',
  'opus',
  'page',
  'paragraph',
  'part',
  'rule',
  'scene',
  'section',
  'sub-verbo',
  'supplement',
  'table',
  'timestamp',
  'title-locator',
  'verse',
  'volume'
] as const;

export type LocatorLabel = (typeof LOCATOR_LABELS)[number];

export const citeItemSchema = z.object({
  entryId: z.string().trim().min(1),
  locator: z.string().trim().min(1).optional(),
  label: z.enum(LOCATOR_LABELS).optional(),
  prefix: z.string().optional(),
  suffix: z.string().optional()
});

export const citationEventSchema = z.object({
  /** Document position; must increase from one event to the next. Assigned when omitted. */
  position: z.number().int().nonnegative().optional(),
  noteNumber: z.number().int().positive().optional(),
  cites: z.array(citeItemSchema)
});

export type CiteItem = z.infer<typeof citeItemSchema>;

export type CitationEventInput = z.input<typeof citationEventSchema>;

export type ParsedCitationEvent = z.infer<typeof citationEventSchema>;
