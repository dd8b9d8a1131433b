import { createHash } from 'node:crypto';

export function sanitizeFilename(input: string): string {
  const base = input
    .replace(/[\\:*?"<>|#]/g, '_')
    .replace(/\s+/g, ' ')
    .trim();
  return base || 'file';
}

export function ensureAbsoluteUrl(baseUrl: string, href: string | undefined | null): string | null {
  if (!href) return null;
  try {
    const url = new URL(href.trim(), baseUrl);
    return url.toString();
  } catch {
    return null;
  }
}

export function textClean(s: string): string {
  return s.replace(/\s+/g, ' ').trim();
}

export function shortHash(input: string): string {
  return createHash('md5').update(input).digest('hex').slice(0, 8);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Decodes text with the charset named in `contentType`, falling back to UTF-8. */
export function decodeText(body: Buffer, contentType?: string): string {
  const charset = contentType
    ?.toLowerCase()
    .match(/charset=([^;]+)/)?.[1]
    ?.trim()
    .replace(/^["']|["']$/g, '');
  if (!charset) return body.toString('utf-8');
  try {
    return new TextDecoder(charset).decode(body);
  } catch {
    return body.toString('utf-8');
  }
}
