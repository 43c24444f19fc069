import type { DatasetDescriptor } from '../domain/model/Dataset.js';
import { SHARED_TRIP_COLUMNS, integer, money } from './tripColumns.js';

/** Yellow (medallion) trip records, one monthly extract. */
export const YELLOW_TRIPS: DatasetDescriptor = {
  name: 'yellow-trips',
  url: 'https://d37ci6vzurychx.cloudfront.net/trip-data/yellow_tripdata_2025-11.parquet',
  format: 'columnar',
  tableName: 'yellow_taxi_trips',
  columns: [
    integer('VendorID', ['vendor_id']),
    { name: 'tpep_pickup_datetime', type: 'timestamp', required: true },
    { name: 'tpep_dropoff_datetime', type: 'timestamp', required: true },
    ...SHARED_TRIP_COLUMNS,
    // Capitalised in 2023+ extracts, lowercase before.
    money('Airport_fee', ['airport_fee']),
  ],
};
