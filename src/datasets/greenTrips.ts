import type { DatasetDescriptor } from '../domain/model/Dataset.js';
import { SHARED_TRIP_COLUMNS, integer, money } from './tripColumns.js';

/** Green (street-hail) trip records, one monthly extract. */
export const GREEN_TRIPS: DatasetDescriptor = {
  name: 'green-trips',
  url: 'https://d37ci6vzurychx.cloudfront.net/trip-data/green_tripdata_2025-11.parquet',
  format: 'columnar',
  tableName: 'green_taxi_trips',
  columns: [
    integer('VendorID', ['vendor_id']),
    { name: 'lpep_pickup_datetime', type: 'timestamp', required: true },
    { name: 'lpep_dropoff_datetime', type: 'timestamp', required: true },
    ...SHARED_TRIP_COLUMNS,
    money('ehail_fee'),
    integer('trip_type'),
  ],
};
