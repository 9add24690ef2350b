/**
 * Shared result envelopes.
 */

/**
 * Result of fetching and normalizing data from an upstream API.
 *
 * Includes both successful data and a log of skipped items
 * for debugging without crashing.
 */
export interface FetchResult<T> {
  /** Successfully parsed items */
  data: T[];

  /** Log of skipped items with reasons */
  errors: string[];

  /** ISO 8601 timestamp when fetch completed */
  fetchedAt: string;
}

export interface Page<T> {
  items: T[];
  page: number;
  pageSize: number;
  total: number;
  totalPages: number;
}
