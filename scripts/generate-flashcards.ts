#!/usr/bin/env npx tsx
/**
 * Research a topic and generate a flashcard set for it on demand.
 *
 * Usage:
 *   npx tsx scripts/generate-flashcards.ts <userId> "<topic>"
 *   npx tsx scripts/generate-flashcards.ts alice@example.com "Zero-knowledge proofs" --no-store
 */

import { loadConfig } from '../src/lib/config';
import { errorMessage } from '../src/lib/errors';
import { FlashcardGenerationAgent, ResearchAgent } from '../src/lib/agents';
import { closeKnowledgeBase, getUserKnowledgeBase } from '../src/lib/kb';
import { generateFlashcardsForTopic } from '../src/lib/pipeline/orchestrator';

const [USER_ID, TOPIC] = process.argv.slice(2).filter((arg) => !arg.startsWith('--'));
const NO_STORE = process.argv.includes('--no-store');

async function main() {
  if (!USER_ID || !TOPIC?.trim()) {
    console.error('Usage: npx tsx scripts/generate-flashcards.ts <userId> "<topic>" [--no-store]');
    process.exit(1);
  }

  const config = loadConfig();
  const researcher = new ResearchAgent({ config });
  const generator = new FlashcardGenerationAgent({ config });
  const kb = NO_STORE ? null : getUserKnowledgeBase(USER_ID, { config });

  try {
    console.log(`🔎 Researching "${TOPIC}"...\n`);
    const result = await generateFlashcardsForTopic(kb, TOPIC, { researcher, generator });

    if (result.status === 'skipped') {
      console.log(`⚠️  Skipped at ${result.stage}: ${result.reason}`);
      return;
    }

    console.log(`📝 ${result.flashcards.length} flashcards for "${result.topic}"`);
    result.flashcards.forEach((card, i) => {
      console.log(`\n${i + 1}. Q: ${card.question}`);
      console.log(`   A: ${card.answer}`);
    });
    console.log(`\nStored: ${result.stored ? '✅' : NO_STORE ? 'skipped (--no-store)' : '❌'}`);
  } finally {
    if (kb) await closeKnowledgeBase(kb);
  }
}

main().catch((error) => {
  console.error('Fatal error:', errorMessage(error));
  process.exit(1);
});
