import type { ColumnDefinition } from '../domain/model/ColumnSchema.js';

/** Monetary amount: `NUMERIC(12,2)`. */
export function money(name: string, aliases?: readonly string[]): ColumnDefinition {
  return { name, type: 'decimal', precision: 12, scale: 2, aliases };
}

export function integer(name: string, aliases?: readonly string[]): ColumnDefinition {
  return { name, type: 'integer', aliases };
}

/** Columns both trip record layouts share, after the pickup and dropoff timestamps. */
export const SHARED_TRIP_COLUMNS: readonly ColumnDefinition[] = [
  integer('passenger_count'),
  { name: 'trip_distance', type: 'decimal', precision: 10, scale: 2 },
  integer('RatecodeID', ['ratecode_id']),
  { name: 'store_and_fwd_flag', type: 'text', trim: true },
  integer('PULocationID', ['pu_location_id']),
  integer('DOLocationID', ['do_location_id']),
  integer('payment_type'),
  money('fare_amount'),
  money('extra'),
  money('mta_tax'),
  money('tip_amount'),
  money('tolls_amount'),
  money('improvement_surcharge'),
  money('total_amount'),
  money('congestion_surcharge'),
  money('cbd_congestion_fee'),
];
