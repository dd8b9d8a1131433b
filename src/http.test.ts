import http from 'node:http';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { TransportError } from './errors.js';
import { HttpClient } from './http.js';

describe('HttpClient', () => {
  let server: http.Server;
  let base: string;
  let lastUserAgent: string | undefined;

  beforeAll(async () => {
    server = http.createServer((req, res) => {
      lastUserAgent = req.headers['user-agent'];
      if (req.url === '/page') {
        res.writeHead(200, { 'content-type': 'text/html; charset=utf-8' });
        res.end('<p>hello</p>');
      } else if (req.url === '/moved') {
        res.writeHead(301, { location: '/page' });
        res.end();
      } else if (req.url === '/latin1') {
        res.writeHead(200, { 'content-type': 'text/html; charset=iso-8859-1' });
        res.end(Buffer.from('<p>caf\u00e9</p>', 'latin1'));
      } else if (req.url === '/logo.png') {
        res.writeHead(200, { 'content-type': 'image/png' });
        res.end(Buffer.from([137, 80, 78, 71]));
      } else {
        res.writeHead(404);
        res.end();
      }
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('test server has no port');
    base = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  it('fetches page text with its content type', async () => {
    const page = await new HttpClient({ userAgent: 'site-mirror-test' }).page(`${base}/page`);

    expect(page).toEqual({
      body: '<p>hello</p>',
      url: `${base}/page`,
      statusCode: 200,
      contentType: 'text/html; charset=utf-8'
    });
    expect(lastUserAgent).toBe('site-mirror-test');
  });

  it('decodes pages with the charset of their content type', async () => {
    const page = await new HttpClient().page(`${base}/latin1`);
    expect(page.body).toBe('<p>caf\u00e9</p>');
  });

  it('reports the final URL after redirects', async () => {
    const page = await new HttpClient().page(`${base}/moved`);
    expect(page.url).toBe(`${base}/page`);
  });

  it('fetches assets as bytes', async () => {
    const asset = await new HttpClient().asset(`${base}/logo.png`);
    expect(asset.body.equals(Buffer.from([137, 80, 78, 71]))).toBe(true);
    expect(asset.contentType).toBe('image/png');
  });

  it('rejects non-2xx responses with a TransportError', async () => {
    const err = await new HttpClient().page(`${base}/nope`).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({ statusCode: 404, url: `${base}/nope`, message: 'HTTP 404' });
  });
});
