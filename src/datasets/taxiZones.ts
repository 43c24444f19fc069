import type { DatasetDescriptor } from '../domain/model/Dataset.js';

/** Taxi zone lookup: location id → borough, zone and service zone. */
export const TAXI_ZONES: DatasetDescriptor = {
  name: 'taxi-zones',
  url: 'https://github.com/DataTalksClub/nyc-tlc-data/releases/download/misc/taxi_zone_lookup.csv',
  format: 'delimited-text',
  tableName: 'taxi_zones',
  columns: [
    { name: 'locationid', type: 'integer', required: true, aliases: ['location_id'] },
    { name: 'borough', type: 'text', trim: true },
    { name: 'zone', type: 'text', trim: true },
    { name: 'service_zone', type: 'text', trim: true },
  ],
};
