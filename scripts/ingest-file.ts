#!/usr/bin/env npx tsx
/**
 * Add a local text, PDF or Word document to a user's knowledge base.
 *
 * Usage:
 *   npx tsx scripts/ingest-file.ts <userId> <path>
 *   npx tsx scripts/ingest-file.ts alice@example.com ./notes/week-3.pdf
 */

import { readFileSync } from 'fs';
import path from 'path';
import { loadConfig } from '../src/lib/config';
import { errorMessage } from '../src/lib/errors';
import {
  addDocumentToKb,
  closeKnowledgeBase,
  extractAttachmentText,
  getUserKnowledgeBase,
  sanitizeTableName,
} from '../src/lib/kb';

const [USER_ID, FILE_ARG] = process.argv.slice(2);

async function main() {
  if (!USER_ID || !FILE_ARG) {
    console.error('Usage: npx tsx scripts/ingest-file.ts <userId> <path>');
    process.exit(1);
  }

  const filename = path.basename(FILE_ARG);
  console.log(`📄 Reading ${filename}...`);

  // Kind is decided by the extension
  const text = await extractAttachmentText({
    filename,
    contentType: 'application/octet-stream',
    content: readFileSync(FILE_ARG),
  });
  if (!text) {
    console.log('⚠️  No text extracted. Nothing stored.');
    return;
  }
  console.log(`   Extracted ${text.length} chars`);

  const kb = getUserKnowledgeBase(USER_ID, { config: loadConfig() });
  if (!kb) {
    console.error(`❌ Could not open knowledge base for ${USER_ID}`);
    process.exit(1);
  }

  try {
    const added = await addDocumentToKb(
      kb,
      text,
      { source: 'uploaded_file', filename, user_id: kb.userId },
      `file_${sanitizeTableName(filename)}`
    );
    console.log(added ? `✅ Stored in ${kb.namespace}` : '❌ Failed to store document');
  } finally {
    await closeKnowledgeBase(kb);
  }
}

main().catch((error) => {
  console.error('Fatal error:', errorMessage(error));
  process.exit(1);
});
