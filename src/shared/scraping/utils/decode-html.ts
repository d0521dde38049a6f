import { parse as parseContentType } from 'content-type';
import * as iconv from 'iconv-lite';

const DEFAULT_ENCODING = 'utf-8';
// Browsers look for a meta declaration within the first 1024 bytes
const META_SNIFF_BYTES = 1024;
const META_CHARSET = /<meta[^>]+charset\s*=\s*["']?\s*([\w.:-]+)/i;

export interface DecodedHtml {
  html: string;
  encoding: string;
}

export function charsetFromContentType(header: string | null): string | null {
  if (!header) return null;
  try {
    return parseContentType(header).parameters.charset ?? null;
  } catch {
    return null;
  }
}

export function charsetFromMarkup(bytes: Buffer): string | null {
  const head = bytes.subarray(0, META_SNIFF_BYTES).toString('latin1');
  return META_CHARSET.exec(head)?.[1] ?? null;
}

/**
 * Decodes a page body using the transport charset, then a `<meta>`
 * declaration, then UTF-8. Unknown labels are skipped.
 */
export function decodeHtml(bytes: Buffer, contentType: string | null): DecodedHtml {
  const label = [charsetFromContentType(contentType), charsetFromMarkup(bytes)].find(
    (candidate): candidate is string =>
      candidate !== null && iconv.encodingExists(candidate),
  );
  const encoding = label ? label.toLowerCase() : DEFAULT_ENCODING;

  return { html: iconv.decode(bytes, encoding), encoding };
}
