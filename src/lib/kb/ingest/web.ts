/**
 * Web page text extraction for knowledge base ingestion.
 * Fetches a page and reduces its HTML to the visible text of the main content.
 */

import { JSDOM } from 'jsdom';
import { errorMessage } from '@/lib/errors';

const LOG = '[Crawler]';

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

export const DEFAULT_FETCH_TIMEOUT_MS = 15_000;

// Non-content elements removed before text extraction
const STRIPPED_TAGS = ['script', 'style', 'nav', 'footer', 'header', 'aside', 'form', 'meta', 'link'];

const CONTENT_CLASS_PATTERN = /content|main|article|body/;

// NodeFilter.SHOW_TEXT
const SHOW_TEXT = 0x4;

export function withScheme(url: string): string {
  return /^https?:\/\//i.test(url) ? url : `http://${url}`;
}

function findContentByClass(document: Document): Element | null {
  for (const element of Array.from(document.querySelectorAll('[class]'))) {
    if (Array.from(element.classList).some((name) => CONTENT_CLASS_PATTERN.test(name))) {
      return element;
    }
  }
  return null;
}

/**
 * Extract plain text from an HTML document: strips non-content elements,
 * prefers <main>, then <article>, then the first element with a content-like
 * class, and joins the remaining text nodes with newlines.
 * Returns null when no text is left.
 *
 * Raw bytes are decoded by jsdom using the charset of `contentType`, then a
 * `<meta charset>` in the page, then windows-1252.
 */
export function extractTextFromHtml(html: string | Buffer, contentType: string = 'text/html'): string | null {
  const { document } = new JSDOM(html, { contentType }).window;

  for (const tag of STRIPPED_TAGS) {
    for (const element of Array.from(document.getElementsByTagName(tag))) {
      element.remove();
    }
  }

  const root =
    document.querySelector('main') ??
    document.querySelector('article') ??
    findContentByClass(document) ??
    document.documentElement;

  const lines: string[] = [];
  const walker = document.createTreeWalker(root, SHOW_TEXT);
  for (let node = walker.nextNode(); node; node = walker.nextNode()) {
    const text = node.textContent?.trim();
    if (text) lines.push(text);
  }

  const text = lines.join('\n');
  return text ? text : null;
}

export interface FetchUrlContentOptions {
  timeoutMs?: number;
}

/**
 * Fetch a URL and return the extracted page text. Every failure (network,
 * HTTP status, timeout, non-HTML content, empty page) is logged and yields null.
 */
export async function fetchUrlContent(
  url: string,
  options: FetchUrlContentOptions = {}
): Promise<string | null> {
  const target = withScheme(url);
  const timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(target, {
      headers: { 'User-Agent': USER_AGENT },
      redirect: 'follow',
      signal: controller.signal,
    });

    if (!response.ok) {
      console.warn(`${LOG} HTTP error fetching URL ${target}: ${response.status} ${response.statusText}`);
      return null;
    }

    const header = response.headers.get('content-type') ?? '';
    const contentType = header.toLowerCase();
    if (!contentType.includes('text/html')) {
      console.warn(`${LOG} Skipping URL ${target} as content type is not HTML (${contentType}).`);
      return null;
    }

    const bytes = Buffer.from(await response.arrayBuffer());
    const text = extractTextFromHtml(bytes, header.trim());
    if (!text) {
      console.warn(`${LOG} No meaningful text found at ${target} after parsing.`);
      return null;
    }

    return text;
  } catch (error) {
    const reason = controller.signal.aborted ? `timed out after ${timeoutMs}ms` : errorMessage(error);
    console.error(`${LOG} Error fetching URL ${target}: ${reason}`);
    return null;
  } finally {
    clearTimeout(timeoutId);
  }
}
