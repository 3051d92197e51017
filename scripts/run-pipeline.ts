#!/usr/bin/env npx tsx
/**
 * Run the learning pipeline for one user:
 * profile analysis -> topic research -> flashcard generation -> store.
 *
 * Usage:
 *   npx tsx scripts/run-pipeline.ts <userId>
 *   npx tsx scripts/run-pipeline.ts alice@example.com --max-cards=15
 */

import { loadConfig } from '../src/lib/config';
import { errorMessage } from '../src/lib/errors';
import { closeKnowledgeBase } from '../src/lib/kb';
import { createPipelineDeps, runLearningPipeline } from '../src/lib/pipeline/orchestrator';

const USER_ID = process.argv.slice(2).find((arg) => !arg.startsWith('--'));
const MAX_CARDS = parseInt(process.argv.find((arg) => arg.startsWith('--max-cards='))?.split('=')[1] ?? '10', 10);

async function main() {
  if (!USER_ID || !Number.isInteger(MAX_CARDS) || MAX_CARDS <= 0) {
    console.error('Usage: npx tsx scripts/run-pipeline.ts <userId> [--max-cards=N]');
    process.exit(1);
  }

  console.log(`🎓 Learning pipeline for ${USER_ID}\n`);

  const config = loadConfig();
  const deps = createPipelineDeps(USER_ID, { config });

  try {
    const result = await runLearningPipeline(USER_ID, { ...deps, maxFlashcards: MAX_CARDS });

    if (result.status === 'skipped') {
      console.log(`\n⚠️  Skipped at ${result.stage}: ${result.reason}`);
      return;
    }

    console.log('\n📊 Pipeline Complete');
    console.log(`   Topic: ${result.topic}`);
    console.log(`   Flashcards: ${result.flashcardCount}`);
    console.log(`   Stored: ${result.stored ? '✅' : '❌'}`);
  } finally {
    if (deps.knowledgeBase) await closeKnowledgeBase(deps.knowledgeBase);
  }
}

main().catch((error) => {
  console.error('Fatal error:', errorMessage(error));
  process.exit(1);
});
