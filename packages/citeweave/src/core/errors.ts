export class CiteweaveError extends Error {
  constructor(message: string, public readonly details?: Record<string, unknown>) {
    super(message);
    this.name = 'CiteweaveError';
  }
}

export class UnknownEntryError extends CiteweaveError {
  constructor(public readonly entryId: string) {
    super(`Entry not found: ${entryId}`, { entryId });
    this.name = 'UnknownEntryError';
  }
}

export class InvalidCitationEventError extends CiteweaveError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.name = 'InvalidCitationEventError';
  }
}

/**
 * Raised when two distinct entries still render identically after the year-suffix
 * fallback. This signals a bug in the engine, not bad input.
 */
export class DisambiguationInvariantError extends CiteweaveError {
  constructor(public readonly entryIds: string[], rendered: string) {
    super(`Entries remain ambiguous after year-suffix fallback: ${entryIds.join(', ')}`, { entryIds, rendered });
    this.name = 'DisambiguationInvariantError';
  }
}
