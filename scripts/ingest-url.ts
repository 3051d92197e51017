#!/usr/bin/env npx tsx
/**
 * Crawl a web page and add its text to a user's knowledge base.
 *
 * Usage:
 *   npx tsx scripts/ingest-url.ts <userId> <url>
 */

import { loadConfig } from '../src/lib/config';
import { errorMessage } from '../src/lib/errors';
import {
  addDocumentToKb,
  closeKnowledgeBase,
  fetchUrlContent,
  getUserKnowledgeBase,
  sanitizeTableName,
  withScheme,
} from '../src/lib/kb';

const [USER_ID, URL_ARG] = process.argv.slice(2);

async function main() {
  if (!USER_ID || !URL_ARG) {
    console.error('Usage: npx tsx scripts/ingest-url.ts <userId> <url>');
    process.exit(1);
  }

  const config = loadConfig();
  const kb = getUserKnowledgeBase(USER_ID, { config });
  if (!kb) {
    console.error(`❌ Could not open knowledge base for ${USER_ID}`);
    process.exit(1);
  }

  try {
    const url = withScheme(URL_ARG);
    console.log(`🌐 Fetching ${url}...`);

    const text = await fetchUrlContent(url, { timeoutMs: config.fetchTimeoutMs });
    if (!text) {
      console.log('⚠️  No content extracted. Nothing stored.');
      return;
    }
    console.log(`   Extracted ${text.length} chars`);

    const added = await addDocumentToKb(
      kb,
      text,
      { source: 'crawled_url', url, user_id: kb.userId },
      `crawled_${sanitizeTableName(url)}`
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
