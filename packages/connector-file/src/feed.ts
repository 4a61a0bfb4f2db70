/**
 * Transaction feed ingestion
 *
 * Reads every record of a feed connector and validates it as a
 * transaction record before anything reaches the reconciliation engine.
 */

import type { FeedLocation, IConnector, TransactionRecord } from '@txrecon/core';
import { ConnectorError, asFeedError, formatValidationErrors, validateTransactionRecord } from '@txrecon/core';
import type { FileConnectorConfig } from './base-file-connector.js';

/**
 * Connect, read, validate and disconnect.
 *
 * @throws ConnectorError VALIDATION_ERROR located at the first invalid row
 *   (1-based, in feed order)
 */
export async function readTransactionFeed(
  connector: IConnector<FileConnectorConfig>
): Promise<TransactionRecord[]> {
  const location: FeedLocation = { feed: connector.config.id, filePath: connector.config.filePath };

  await connector.connect();
  try {
    const { records } = await connector.readRecords();
    const transactions: TransactionRecord[] = [];

    records.forEach((raw, index) => {
      const result = validateTransactionRecord(raw);
      if (!result.valid) {
        throw new ConnectorError(
          'VALIDATION_ERROR',
          `Not a valid transaction: ${formatValidationErrors(result.errors)}`,
          {
            ...location,
            row: index + 1,
            suggestion: 'Every row needs transaction_id, message_type, amount, currency and value_date.',
            context: { errors: result.errors },
          }
        );
      }
      transactions.push(result.record);
    });

    return transactions;
  } catch (error) {
    throw asFeedError(error, location, 'READ_FAILED');
  } finally {
    await connector.disconnect();
  }
}
