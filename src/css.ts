export type CssUrlResolver = (absoluteUrl: string) => Promise<string | null>;

const URL_PATTERN = /url\(\s*(['"]?)([^'")]+)\1\s*\)/g;
const IMPORT_PATTERN = /@import\s+(['"])([^'"]+)\1/g;

export function shouldSkipReference(value: string): boolean {
  const trimmed = value.trim();
  return (
    !trimmed ||
    trimmed.startsWith('#') ||
    /^(data|blob|mailto|tel|javascript|about):/i.test(trimmed)
  );
}

function toAbsolute(raw: string, baseUrl: string): string | null {
  try {
    return new URL(raw, baseUrl).toString();
  } catch {
    return null;
  }
}

async function replaceAll(
  text: string,
  pattern: RegExp,
  baseUrl: string,
  resolve: CssUrlResolver,
  render: (quote: string, url: string) => string
): Promise<string> {
  let out = '';
  let lastIndex = 0;
  for (const match of text.matchAll(pattern)) {
    const index = match.index ?? 0;
    out += text.slice(lastIndex, index);
    const quote = match[1] || '';
    const raw = (match[2] || '').trim();
    let replacement = match[0];
    if (!shouldSkipReference(raw)) {
      const absolute = toAbsolute(raw, baseUrl);
      const resolved = absolute ? await resolve(absolute) : null;
      if (resolved) replacement = render(quote, resolved);
    }
    out += replacement;
    lastIndex = index + match[0].length;
  }
  return out + text.slice(lastIndex);
}

/**
 * Rewrites `url(...)` and quoted `@import` targets in CSS text.
 * References the resolver returns null for are left as written.
 */
export async function rewriteCssUrls(cssText: string, baseUrl: string, resolve: CssUrlResolver): Promise<string> {
  const withUrls = await replaceAll(cssText, URL_PATTERN, baseUrl, resolve, (q, u) => `url(${q}${u}${q})`);
  return replaceAll(withUrls, IMPORT_PATTERN, baseUrl, resolve, (q, u) => `@import ${q}${u}${q}`);
}
