export class FetchError extends Error {
  name = 'FetchError';

  constructor(
    message: string,
    readonly url: string,
    readonly status?: number,
  ) {
    super(message);
  }
}

export class ParseError extends Error {
  name = 'ParseError';
}

export class DetailFetchError extends Error {
  name = 'DetailFetchError';

  constructor(
    message: string,
    readonly url: string,
  ) {
    super(message);
  }
}

export class UnknownSourceError extends Error {
  name = 'UnknownSourceError';
}

export function describeError(error: unknown): { message: string; type: string } {
  if (error instanceof Error) {
    return { message: error.message, type: error.name };
  }
  return { message: String(error), type: 'Error' };
}
