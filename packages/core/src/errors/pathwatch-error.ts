export type PathwatchErrorCode = 'INVALID_HEX' | 'INVALID_CONFIG' | 'INVALID_FEED_MESSAGE' | 'SEND_FAILED';

export class PathwatchError extends Error {
  readonly code: PathwatchErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: PathwatchErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'PathwatchError';
    this.code = code;
    this.context = context;
  }
}
