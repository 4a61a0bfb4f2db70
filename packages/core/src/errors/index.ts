export { ConnectorError, asFeedError } from './connector-error.js';
export type { FeedErrorCode, FeedLocation, ConnectorErrorOptions } from './connector-error.js';
