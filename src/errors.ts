export type FeedFailureKind = 'transport' | 'parse';

export class FeedFetchError extends Error {
  constructor(
    readonly kind: FeedFailureKind,
    readonly feedName: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'FeedFetchError';
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
