// packages/list-core/src/errors.ts
//
// Errors raised by the word sampler. An exact-search miss is not an error
// (SortedList.exactSearch returns NOT_FOUND), so everything here concerns
// loading words.

export type WordListErrorCode =
  | 'RESOURCE_NOT_FOUND'
  | 'EMPTY_WORD_LIST'
  | 'INVALID_SAMPLE_SIZE';

export class WordListError extends Error {
  readonly code: WordListErrorCode;

  constructor(code: WordListErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'WordListError';
    this.code = code;
  }
}

/** The word list resource could not be located. Not retried. */
export class ResourceNotFoundError extends WordListError {
  readonly resource: string;
  readonly path: string;

  constructor(resource: string, path: string, options?: { cause?: unknown }) {
    super('RESOURCE_NOT_FOUND', `Resource not found: ${resource}`, options);
    this.name = 'ResourceNotFoundError';
    this.resource = resource;
    this.path = path;
  }
}

/** A full pass over the resource produced no usable words. */
export class EmptyWordListError extends WordListError {
  readonly resource: string;

  constructor(resource: string) {
    super('EMPTY_WORD_LIST', 'Word list is empty or invalid.');
    this.name = 'EmptyWordListError';
    this.resource = resource;
  }
}

export class InvalidSampleSizeError extends WordListError {
  readonly count: number;

  constructor(count: number) {
    super(
      'INVALID_SAMPLE_SIZE',
      `Sample size must be a non-negative integer, got ${count}`,
    );
    this.name = 'InvalidSampleSizeError';
    this.count = count;
  }
}

/** Narrows an unknown thrown value to a Node system error with a code. */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
