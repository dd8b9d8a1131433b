import got, { Response } from 'got';
import pLimit from 'p-limit';
import { toTransportError } from './errors.js';
import { decodeText } from './utils.js';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

type HttpOptions = {
  userAgent?: string;
  timeoutMs?: number;
  concurrency?: number;
};

export type FetchedPage = {
  body: string;
  url: string; // final URL after redirects
  statusCode: number;
  contentType?: string;
};

export type FetchedAsset = {
  body: Buffer;
  url: string;
  statusCode: number;
  contentType?: string;
};

/**
 * Network seam used by the crawler and the asset fetcher.
 * Implementations reject with a TransportError on timeout, non-2xx or connection failure.
 */
export interface Fetcher {
  page(url: string): Promise<FetchedPage>;
  asset(url: string): Promise<FetchedAsset>;
}

export class HttpClient implements Fetcher {
  private client = got.extend({
    headers: { 'user-agent': DEFAULT_USER_AGENT, accept: '*/*', 'accept-language': 'en-US,en;q=0.9' },
    followRedirect: true,
    retry: { limit: 0 },
    timeout: { request: 30000 }
  });

  private limit: ReturnType<typeof pLimit>;

  constructor(opts: HttpOptions = {}) {
    const { userAgent, timeoutMs, concurrency } = opts;
    this.client = this.client.extend({
      headers: userAgent ? { 'user-agent': userAgent } : undefined,
      timeout: timeoutMs ? { request: timeoutMs } : undefined
    });
    this.limit = pLimit(Math.max(1, concurrency ?? 4));
  }

  async page(url: string): Promise<FetchedPage> {
    return this.limit(async () => {
      try {
        const res: Response<Buffer> = await this.client.get(url, { responseType: 'buffer' });
        const contentType = res.headers['content-type'];
        return { body: decodeText(res.body, contentType), url: res.url, statusCode: res.statusCode, contentType };
      } catch (err) {
        throw toTransportError(url, err);
      }
    });
  }

  async asset(url: string): Promise<FetchedAsset> {
    return this.limit(async () => {
      try {
        const res: Response<Buffer> = await this.client.get(url, { responseType: 'buffer' });
        return { body: res.body, url: res.url, statusCode: res.statusCode, contentType: res.headers['content-type'] };
      } catch (err) {
        throw toTransportError(url, err);
      }
    });
  }
}
