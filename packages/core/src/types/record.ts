/**
 * Record types for data exchange between feed connectors and the engine
 */

/** Generic record type - a row of data */
export type Record = {
  [key: string]: unknown;
};

/** Result of a read operation */
export interface ReadResult {
  /** The retrieved records, in feed order */
  records: Record[];
  /** Total number of records in the feed */
  totalCount: number;
}

/** Validation result for a single record */
export interface ValidationResult {
  valid: boolean;
  errors?: ValidationError[];
}

export interface ValidationError {
  field: string;
  message: string;
  value?: unknown;
}
