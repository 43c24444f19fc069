import type { DataSource } from '../../domain/ports/DataSource.js';
import { FilePathSource } from './FilePathSource.js';
import { UrlSource } from './UrlSource.js';
import type { UrlSourceOptions } from './UrlSource.js';

const REMOTE_LOCATION = /^https?:\/\//i;

/** Pick a `UrlSource` for `http(s)://` locations and a `FilePathSource` for everything else. */
export function createSource(location: string, options?: UrlSourceOptions): DataSource {
  return REMOTE_LOCATION.test(location) ? new UrlSource(location, options) : new FilePathSource(location);
}
