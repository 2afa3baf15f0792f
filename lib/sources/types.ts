// lib/sources/types.ts

import type { RawFactRow } from '../reporting/types';

/**
 * Where the raw P&L facts and the expected calendar come from.
 * Sources only load; all coercion happens in the normalizer.
 */
export interface FactSource {
  readonly name: string;
  loadFacts(): Promise<RawFactRow[]>;
  /** Month-end dates of the date dimension, as delivered by the source. */
  loadCalendar(): Promise<Array<string | Date>>;
  close(): Promise<void>;
}
