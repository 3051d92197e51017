/**
 * Store already-parsed email content in a user's knowledge base.
 *
 * Mailbox polling lives outside this module; it hands over the decoded body
 * and links, with attachment text read by `readEmailAttachments`. This module
 * decides what gets ingested.
 */

import { addDocumentToKb, sanitizeTableName } from '../knowledge-base';
import type { KnowledgeBase } from '../types';
import { fetchUrlContent } from './web';

const LOG = '[Ingest]';

export const DEFAULT_EMAIL_USER = 'shared_user';

export interface EmailAttachment {
  filename: string;
  contentType: string;
  /** Extracted text, null when the attachment could not be read */
  text: string | null;
  docId: string;
}

export interface ParsedEmail {
  /** Message-ID header, or a mailbox uid fallback, used to build document ids */
  docIdPrefix: string;
  subject: string;
  from: string;
  date?: string;
  messageId?: string;
  body: string;
  /** href values from the HTML part */
  htmlLinks?: string[];
  attachments: EmailAttachment[];
}

export interface IngestEmailOptions {
  /** Maximum number of links crawled per email */
  maxLinks?: number;
  fetchPage?: (url: string) => Promise<string | null>;
}

export interface IngestResult {
  attempted: number;
  stored: number;
}

const URL_PATTERN = /https?:\/\/[^\s<>"]+|www\.[^\s<>"]+/g;
const TRAILING_PUNCTUATION = /[.,;:!?)\]]+$/;
const ANGLE_ADDRESS = /<([^>]+)>/;

/**
 * Links in free text; bare www. links get an http:// scheme and sentence
 * punctuation after a link is dropped. Sorted, unique.
 */
export function extractUrlsFromText(text: string): string[] {
  const urls = new Set<string>();
  for (const match of text.match(URL_PATTERN) ?? []) {
    const url = match.replace(TRAILING_PUNCTUATION, '');
    urls.add(url.startsWith('www.') ? `http://${url}` : url);
  }
  return [...urls].sort();
}

/**
 * The sender address, lowercased, from a From header such as
 * `Alice <alice@example.com>`. Falls back when there is no usable address.
 */
export function resolveEmailUserId(from: string, fallback: string = DEFAULT_EMAIL_USER): string {
  const address = (ANGLE_ADDRESS.exec(from)?.[1] ?? from).trim().toLowerCase();
  return address.includes('@') ? address : fallback;
}

function emailLinks(email: ParsedEmail): string[] {
  const links = new Set(extractUrlsFromText(email.body));
  for (const href of email.htmlLinks ?? []) {
    if (href && !href.startsWith('mailto:')) links.add(href);
  }
  return [...links].sort();
}

export async function ingestParsedEmail(
  kb: KnowledgeBase,
  email: ParsedEmail,
  options: IngestEmailOptions = {}
): Promise<IngestResult> {
  const { maxLinks = 2, fetchPage = fetchUrlContent } = options;
  const result: IngestResult = { attempted: 0, stored: 0 };
  const messageId = email.messageId ?? null;

  const store = async (content: string, metadata: Record<string, string | null>, id: string) => {
    result.attempted += 1;
    if (await addDocumentToKb(kb, content, metadata, id)) {
      result.stored += 1;
    }
  };

  const body = email.body.trim();
  if (body) {
    await store(
      body,
      {
        source: 'email_body',
        subject: email.subject,
        email_date: email.date ?? null,
        from: email.from,
        message_id: messageId,
        user_id: kb.userId,
      },
      `email_${email.docIdPrefix}_body`
    );
  }

  for (const attachment of email.attachments) {
    if (!attachment.text?.trim()) continue;
    await store(
      attachment.text,
      {
        source: 'email_attachment',
        filename: attachment.filename,
        content_type: attachment.contentType,
        email_subject: email.subject,
        message_id: messageId,
        user_id: kb.userId,
      },
      attachment.docId
    );
  }

  for (const url of emailLinks(email).slice(0, maxLinks)) {
    const text = await fetchPage(url);
    if (!text) continue;
    await store(
      text,
      {
        source: 'crawled_url',
        url,
        email_subject_source: email.subject,
        message_id: messageId,
        user_id: kb.userId,
      },
      `crawled_${sanitizeTableName(url)}_from_${email.docIdPrefix}`
    );
  }

  if (result.stored > 0) {
    console.log(`${LOG} Stored ${result.stored}/${result.attempted} document(s) for ${kb.userId} from "${email.subject.slice(0, 50)}".`);
  } else {
    console.log(`${LOG} No new content stored for ${kb.userId} from "${email.subject.slice(0, 50)}".`);
  }

  return result;
}
