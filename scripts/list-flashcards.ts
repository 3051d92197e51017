#!/usr/bin/env npx tsx
/**
 * List a user's stored flashcard sets, or just their topics.
 *
 * Usage:
 *   npx tsx scripts/list-flashcards.ts <userId>
 *   npx tsx scripts/list-flashcards.ts <userId> --topic="Zero-knowledge proofs"
 *   npx tsx scripts/list-flashcards.ts <userId> --topics
 */

import { loadConfig } from '../src/lib/config';
import { errorMessage } from '../src/lib/errors';
import {
  closeKnowledgeBase,
  getAvailableFlashcardTopics,
  getFlashcardSetsForUser,
  getUserKnowledgeBase,
  toStoredFlashcardSet,
} from '../src/lib/kb';
import type { StoredFlashcardSet } from '../src/types';

const USER_ID = process.argv.slice(2).find((arg) => !arg.startsWith('--'));
const TOPIC = process.argv.find((arg) => arg.startsWith('--topic='))?.slice('--topic='.length);
const TOPICS_ONLY = process.argv.includes('--topics');

async function main() {
  if (!USER_ID) {
    console.error('Usage: npx tsx scripts/list-flashcards.ts <userId> [--topic=<topic>] [--topics]');
    process.exit(1);
  }

  const kb = getUserKnowledgeBase(USER_ID, { config: loadConfig() });
  if (!kb) {
    console.error(`❌ Could not open knowledge base for ${USER_ID}`);
    process.exit(1);
  }

  try {
    if (TOPICS_ONLY) {
      const topics = await getAvailableFlashcardTopics(kb);
      console.log(`📚 ${topics.length} topic(s)`);
      for (const topic of topics) console.log(`   - ${topic}`);
      return;
    }

    const docs = await getFlashcardSetsForUser(kb, { topic: TOPIC });
    const sets = docs.map(toStoredFlashcardSet).filter((set): set is StoredFlashcardSet => set !== null);

    console.log(`📚 ${sets.length} flashcard set(s)${TOPIC ? ` for "${TOPIC}"` : ''}\n`);
    for (const set of sets) {
      console.log(`${set.topic} (${set.flashcards.length} cards, ${set.creationDate}, ${set.source})`);
      for (const card of set.flashcards) {
        console.log(`   Q: ${card.question}`);
        console.log(`   A: ${card.answer}`);
      }
      console.log('');
    }
  } finally {
    await closeKnowledgeBase(kb);
  }
}

main().catch((error) => {
  console.error('Fatal error:', errorMessage(error));
  process.exit(1);
});
