export type EntryType =
  | 'article'
  | 'article-journal'
  | 'article-magazine'
  | 'article-newspaper'
  | 'bill'
  | 'book'
  | 'broadcast'
  | 'chapter'
  | 'dataset'
  | 'entry'
  | 'entry-dictionary'
  | 'entry-encyclopedia'
  | 'graphic'
  | 'interview'
  | 'legal_case'
  | 'legislation'
  | 'manuscript'
  | 'map'
  | 'motion_picture'
  | 'musical_score'
  | 'original'
  | 'pamphlet'
  | 'paper-conference'
  | 'patent'
  | 'performance'
  | 'personal_communication'
  | 'post'
  | 'post-weblog'
  | 'report'
  | 'review'
  | 'software'
  | 'song'
  | 'speech'
  | 'thesis'
  | 'treaty'
  | 'webpage';

/** Half-open `[start, end)` range of UTF-16 offsets into the owning string. */
export interface Span {
  start: number;
  end: number;
}

export interface FormattableString {
  value: string;
  /** Substrings exempt from every case transform. Sorted, non-overlapping. */
  verbatim: readonly Span[];
}

export interface PersonName {
  family?: string;
  given?: string;
  nonDroppingParticle?: string;
  droppingParticle?: string;
  suffix?: string;
  /** Institutional or otherwise unparsed name, rendered as-is. */
  literal?: string;
  /** Render "Jr." after a comma in display order ("John Smith, Jr."). */
  commaSuffix?: boolean;
}

export type Season = 1 | 2 | 3 | 4;

export interface DateParts {
  year: number;
  month?: number;
  day?: number;
  season?: Season;
}

export interface StructuredDate extends DateParts {
  approximate?: boolean;
  end?: DateParts;
  /** Free-form date that could not be parsed; rendered verbatim. */
  literal?: string;
}

export interface NumberWithAffix {
  value: number | string;
  prefix?: string;
  suffix?: string;
}

export type VariableValue =
  | { kind: 'text'; text: FormattableString }
  | { kind: 'names'; names: readonly PersonName[] }
  | { kind: 'date'; date: StructuredDate }
  | { kind: 'number'; number: NumberWithAffix }
  | { kind: 'serial'; serials: Readonly<Record<string, string>> };

export interface Entry {
  id: string;
  type: EntryType;
  variables: Readonly<Record<string, VariableValue>>;
}

export interface EntryStore {
  get(id: string): Entry | undefined;
}

export const createEntryStore = (entries: Iterable<Entry>): EntryStore => {
  const byId = new Map<string, Entry>();
  for (const entry of entries) {
    byId.set(entry.id, entry);
  }

  return {
    get: (id) => byId.get(id)
  };
};

/** Variables whose values live in the `serial-number` collection when not set directly. */
const SERIAL_VARIABLES = new Set(['DOI', 'ISBN', 'ISSN', 'PMID', 'PMCID', 'call-number', 'number']);

export const lookupVariable = (entry: Entry, name: string): VariableValue | undefined => {
  const direct = entry.variables[name];
  if (direct) {
    return direct;
  }

  if (!SERIAL_VARIABLES.has(name)) {
    return undefined;
  }

  const serial = entry.variables['serial-number'];
  if (serial?.kind !== 'serial') {
    return undefined;
  }

  const value = serial.serials[name.toLowerCase()];
  return value ? { kind: 'text', text: plain(value) } : undefined;
};

export const plain = (value: string): FormattableString => ({ value, verbatim: [] });

/**
 * Builds a FormattableString from brace-marked text: `The {CIA} Files` keeps `CIA`
 * out of case transforms. Nested braces are flattened into the outer span and
 * unbalanced closing braces are kept as literal characters.
 */
export const parseFormattable = (input: string): FormattableString => {
  let value = '';
  const verbatim: Span[] = [];
  let depth = 0;
  let spanStart = 0;

  for (const char of input) {
    if (char === '{') {
      if (depth === 0) {
        spanStart = value.length;
      }
      depth += 1;
      continue;
    }

    if (char === '}' && depth > 0) {
      depth -= 1;
      if (depth === 0 && value.length > spanStart) {
        verbatim.push({ start: spanStart, end: value.length });
      }
      continue;
    }

    value += char;
  }

  if (depth > 0 && value.length > spanStart) {
    verbatim.push({ start: spanStart, end: value.length });
  }

  return { value, verbatim };
};

export const isEmptyValue = (value: VariableValue | undefined): boolean => {
  if (!value) {
    return true;
  }

  switch (value.kind) {
    case 'text':
      return value.text.value.trim().length === 0;
    case 'names':
      return value.names.length === 0;
    case 'date':
      return false;
    case 'number':
      return String(value.number.value).trim().length === 0;
    case 'serial':
      return Object.keys(value.serials).length === 0;
  }
};

/** Plain string form of any variable, used by value tests and literal sort fallbacks. */
export const variableAsString = (value: VariableValue | undefined): string => {
  if (!value) {
    return '';
  }

  switch (value.kind) {
    case 'text':
      return value.text.value;
    case 'names':
      return value.names
        .map((name) => name.literal ?? [name.given, name.family].filter(Boolean).join(' '))
        .join(', ');
    case 'date': {
      const { date } = value;
      if (date.literal) {
        return date.literal;
      }
      return [date.year, date.month, date.day].filter((part) => part !== undefined).join('-');
    }
    case 'number':
      return `${value.number.prefix ?? ''}${value.number.value}${value.number.suffix ?? ''}`;
    case 'serial':
      return Object.values(value.serials).join(' ');
  }
};
