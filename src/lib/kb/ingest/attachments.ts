/**
 * Text extraction for email attachments and uploaded files.
 * Plain text, PDF and Word (.docx) documents are read; other types are skipped.
 */

import { extractRawText } from 'mammoth';
import pdf from 'pdf-parse/lib/pdf-parse.js';
import { errorMessage } from '@/lib/errors';
import { sanitizeTableName } from '../knowledge-base';
import type { EmailAttachment } from './email';

const LOG = '[Ingest]';

export type AttachmentKind = 'txt' | 'pdf' | 'docx';

const KIND_BY_CONTENT_TYPE: Record<string, AttachmentKind> = {
  'text/plain': 'txt',
  'application/pdf': 'pdf',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document': 'docx',
};

export interface RawAttachment {
  filename: string;
  contentType: string;
  content: Buffer;
}

/**
 * Kind of document by file extension, falling back to the MIME type.
 */
export function attachmentKind(filename: string, contentType: string): AttachmentKind | null {
  const extension = filename.includes('.') ? filename.toLowerCase().split('.').pop() : undefined;
  if (extension === 'txt' || extension === 'pdf' || extension === 'docx') return extension;

  const mimeType = (contentType.split(';')[0] ?? '').trim().toLowerCase();
  return KIND_BY_CONTENT_TYPE[mimeType] ?? null;
}

async function readText(kind: AttachmentKind, content: Buffer): Promise<string> {
  switch (kind) {
    case 'txt':
      // Invalid sequences become U+FFFD
      return content.toString('utf8').replace(/^\uFEFF/, '');
    case 'pdf':
      return (await pdf(content)).text;
    case 'docx':
      return (await extractRawText({ buffer: content })).value;
  }
}

/**
 * Visible text of an attachment, trimmed. Null for unsupported types,
 * unreadable files and documents without text.
 */
export async function extractAttachmentText(attachment: RawAttachment): Promise<string | null> {
  const { filename, contentType, content } = attachment;
  const kind = attachmentKind(filename, contentType);
  if (!kind) {
    console.log(`${LOG} Attachment type not parsed: ${filename} (${contentType})`);
    return null;
  }

  try {
    const text = (await readText(kind, content)).trim();
    if (!text) {
      console.warn(`${LOG} No text in ${kind} attachment ${filename}`);
      return null;
    }
    return text;
  } catch (error) {
    console.error(`${LOG} Error reading ${kind} attachment ${filename}: ${errorMessage(error)}`);
    return null;
  }
}

export function attachmentDocId(docIdPrefix: string, filename: string): string {
  return `email_${docIdPrefix}_attachment_${sanitizeTableName(filename)}`;
}

/**
 * Turn the raw attachments of one email into the form `ingestParsedEmail` stores.
 */
export async function readEmailAttachments(
  docIdPrefix: string,
  attachments: RawAttachment[]
): Promise<EmailAttachment[]> {
  const results: EmailAttachment[] = [];
  for (const attachment of attachments) {
    results.push({
      filename: attachment.filename,
      contentType: attachment.contentType,
      text: await extractAttachmentText(attachment),
      docId: attachmentDocId(docIdPrefix, attachment.filename),
    });
  }
  return results;
}
