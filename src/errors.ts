export type LexiconErrorCode = 'InvalidEntry' | 'ParseCancelled' | 'InvalidVocabulary' | 'InvalidInterchange';

export class LexiconError extends Error {
  readonly code: LexiconErrorCode;

  constructor(code: LexiconErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A committed entity broke a model invariant; fails the page being assembled. */
export class InvalidEntryError extends LexiconError {
  readonly reason: string;

  constructor(reason: string) {
    super('InvalidEntry', `Invalid entry: ${reason}`);
    this.reason = reason;
  }
}

export class ParseCancelledError extends LexiconError {
  constructor(headword?: string) {
    super('ParseCancelled', headword ? `Parsing of "${headword}" was cancelled` : 'Parsing was cancelled');
  }
}

export class InvalidVocabularyError extends LexiconError {
  constructor(message: string) {
    super('InvalidVocabulary', message);
  }
}

export class InvalidInterchangeError extends LexiconError {
  constructor(message: string) {
    super('InvalidInterchange', message);
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
