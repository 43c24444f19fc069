import type { DataSource } from '../../domain/ports/DataSource.js';
import { FetchError, errorMessage } from '../../domain/errors.js';

export interface UrlSourceOptions {
  /** Request timeout in milliseconds. Default: none (left to the transport). */
  readonly timeout?: number;
}

/**
 * Data source that downloads a file over HTTP(S) using the Fetch API.
 *
 * Streams the response body chunk by chunk. Requires a runtime with global `fetch`.
 */
export class UrlSource implements DataSource {
  private readonly url: string;
  private readonly timeout: number | undefined;

  constructor(url: string, options?: UrlSourceOptions) {
    this.url = url;
    this.timeout = options?.timeout;
  }

  async *read(): AsyncIterable<Buffer> {
    const controller = new AbortController();
    const timeoutId =
      this.timeout === undefined
        ? undefined
        : setTimeout(() => {
            controller.abort();
          }, this.timeout);

    try {
      const response = await this.request(controller.signal);

      if (!response.ok) {
        throw new FetchError(
          this.url,
          `HTTP ${String(response.status)} ${response.statusText} for ${this.url}`,
          { status: response.status },
        );
      }

      if (!response.body) {
        yield Buffer.from(await response.arrayBuffer());
        return;
      }

      const reader = response.body.getReader();
      try {
        for (;;) {
          const { done, value } = await reader.read();
          if (done) break;
          yield Buffer.from(value);
        }
      } catch (error) {
        throw new FetchError(this.url, `Download of ${this.url} interrupted: ${errorMessage(error)}`, {
          cause: error,
        });
      } finally {
        reader.releaseLock();
      }
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async request(signal: AbortSignal): Promise<Response> {
    try {
      return await fetch(this.url, { signal });
    } catch (error) {
      throw new FetchError(this.url, `Request to ${this.url} failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
