/**
 * Errors raised while ingesting a ledger feed
 */

export type FeedErrorCode =
  | 'NOT_FOUND'
  | 'PERMISSION_DENIED'
  | 'CONNECTION_FAILED'
  | 'SCHEMA_MISMATCH'
  | 'VALIDATION_ERROR'
  | 'READ_FAILED'
  | 'CONFIGURATION_ERROR';

/** Where in a feed a problem was found */
export interface FeedLocation {
  /** Connector id of the feed, e.g. "source" */
  feed: string;
  filePath?: string;
  /** 1-based position of the record in the feed */
  row?: number;
}

export interface ConnectorErrorOptions extends FeedLocation {
  suggestion?: string;
  cause?: unknown;
  context?: Record<string, unknown>;
}

export class ConnectorError extends Error {
  readonly code: FeedErrorCode;
  readonly location: FeedLocation;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(code: FeedErrorCode, message: string, options: ConnectorErrorOptions) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ConnectorError';
    this.code = code;
    this.location = {
      feed: options.feed,
      ...(options.filePath !== undefined ? { filePath: options.filePath } : {}),
      ...(options.row !== undefined ? { row: options.row } : {}),
    };
    this.suggestion = options.suggestion;
    this.context = options.context;
  }

  /** e.g. `feed source (/data/payments.json), row 3` */
  describeLocation(): string {
    const { feed, filePath, row } = this.location;
    let text = `feed ${feed}`;
    if (filePath) text += ` (${filePath})`;
    if (row !== undefined) text += `, row ${row}`;
    return text;
  }

  toActionableMessage(): string {
    const lines = [`Error [${this.code}]: ${this.message}`, `At: ${this.describeLocation()}`];
    if (this.suggestion) {
      lines.push(`Suggested action: ${this.suggestion}`);
    }
    return lines.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...this.location,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

/**
 * Anything thrown while reading a feed, as a ConnectorError for that feed.
 * Errors that already are one pass through unchanged.
 */
export function asFeedError(
  error: unknown,
  location: FeedLocation,
  code: FeedErrorCode
): ConnectorError {
  if (error instanceof ConnectorError) {
    return error;
  }
  return new ConnectorError(code, error instanceof Error ? error.message : String(error), {
    ...location,
    cause: error,
  });
}
