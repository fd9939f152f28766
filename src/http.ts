import got, { HTTPError, type Got, type Response } from 'got';
import { FetchError, errorMessage } from './errors.js';
import type { FetchResponse } from './types.js';

export interface Fetcher {
  /** Resolves for 2xx responses; every other outcome rejects with FetchError. */
  fetch(url: string): Promise<FetchResponse>;
}

type HttpOptions = {
  userAgent?: string;
  timeoutMs?: number;
};

export class HttpClient implements Fetcher {
  private client: Got;

  constructor(opts: HttpOptions = {}) {
    const { userAgent, timeoutMs } = opts;
    // retries are owned by the frontier, not the HTTP layer
    this.client = got.extend({
      headers: userAgent ? { 'user-agent': userAgent } : {},
      followRedirect: true,
      retry: { limit: 0 },
      timeout: { request: timeoutMs ?? 15000 }
    });
  }

  async fetch(url: string): Promise<FetchResponse> {
    let res: Response<Buffer>;
    try {
      res = await this.client.get(url, { responseType: 'buffer' });
    } catch (err) {
      if (err instanceof HTTPError) {
        throw new FetchError(`HTTP ${err.response.statusCode}`, { statusCode: err.response.statusCode, cause: err });
      }
      throw new FetchError(errorMessage(err), { cause: err });
    }
    const contentType = res.headers['content-type'];
    return {
      url: res.url,
      statusCode: res.statusCode,
      contentType: typeof contentType === 'string' ? contentType : '',
      body: res.body
    };
  }
}
