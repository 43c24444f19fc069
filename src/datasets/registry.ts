import type { DatasetDescriptor } from '../domain/model/Dataset.js';
import { GREEN_TRIPS } from './greenTrips.js';
import { YELLOW_TRIPS } from './yellowTrips.js';
import { TAXI_ZONES } from './taxiZones.js';

/** Every known dataset, in the order a run ingests them. */
export const DATASETS: readonly DatasetDescriptor[] = [GREEN_TRIPS, YELLOW_TRIPS, TAXI_ZONES];

export const DATASET_NAMES = ['green-trips', 'yellow-trips', 'taxi-zones'] as const;

export type DatasetName = (typeof DATASET_NAMES)[number];

/** Per-dataset replacement of the source location and destination table. */
export interface DatasetOverride {
  readonly url?: string;
  readonly tableName?: string;
}

export type DatasetOverrides = Partial<Record<DatasetName, DatasetOverride>>;

export function isDatasetName(value: string): value is DatasetName {
  return DATASET_NAMES.some((name) => name === value);
}

/**
 * Resolve the descriptors to run, applying overrides. `only` restricts the run to the named
 * datasets; the result keeps the fixed ingest order regardless of the order given.
 */
export function buildDatasets(overrides: DatasetOverrides = {}, only?: readonly string[]): DatasetDescriptor[] {
  if (only) {
    const unknown = only.filter((name) => !isDatasetName(name));
    if (unknown.length > 0) {
      throw new Error(`Unknown dataset(s): ${unknown.join(', ')}. Known: ${DATASET_NAMES.join(', ')}`);
    }
  }

  return DATASETS.filter((d) => !only || only.includes(d.name)).map((descriptor) => {
    const override = isDatasetName(descriptor.name) ? overrides[descriptor.name] : undefined;
    return {
      ...descriptor,
      url: override?.url ?? descriptor.url,
      tableName: override?.tableName ?? descriptor.tableName,
    };
  });
}

export function findDataset(name: string, overrides: DatasetOverrides = {}): DatasetDescriptor | undefined {
  return isDatasetName(name) ? buildDatasets(overrides, [name])[0] : undefined;
}
