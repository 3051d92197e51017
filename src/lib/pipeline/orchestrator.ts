/**
 * Learning Pipeline
 *
 * Profile -> Research -> Flashcards -> store. Each stage either hands a usable
 * result to the next one or ends the run as skipped, so nothing is persisted
 * from an empty upstream stage.
 */

import { loadConfig, type AppConfig } from '@/lib/config';
import {
  FlashcardGenerationAgent,
  LearningProfileAgent,
  ResearchAgent,
  type FlashcardGenerator,
  type LanguageModel,
  type ProfileAnalyzer,
  type TopicResearcher,
} from '@/lib/agents';
import { DEFAULT_FLASHCARD_SOURCE, addFlashcardSetToKb } from '@/lib/kb/flashcards/sets';
import { getUserKnowledgeBase } from '@/lib/kb/knowledge-base';
import type { Embedder, KnowledgeBase } from '@/lib/kb/types';
import type { Flashcard } from '@/types';

const LOG = '[Pipeline]';

export const AUTOMATED_SOURCE = 'automated_pipeline_from_profile';

/** Research shorter than this is treated as no research */
export const MIN_PIPELINE_RESEARCH_CHARS = 100;
export const MIN_ON_DEMAND_RESEARCH_CHARS = 50;

const PROFILE_MAX_DOCS = 50;
const MAX_DERIVED_TOPICS = 5;
const RESEARCH_SNIPPET_CHARS = 500;

// ============================================
// Types
// ============================================

export type PipelineStage = 'profile' | 'research' | 'flashcards';

export interface SkippedRun {
  status: 'skipped';
  stage: PipelineStage;
  reason: string;
}

export type PipelineResult =
  | { status: 'completed'; topic: string; flashcardCount: number; stored: boolean }
  | SkippedRun;

export type TopicFlashcardsResult =
  | {
      status: 'completed';
      topic: string;
      flashcards: Flashcard[];
      researchSnippet: string;
      stored: boolean;
    }
  | SkippedRun;

export interface PipelineDeps {
  /** Where generated sets are stored; null when the user's index could not be opened */
  knowledgeBase: KnowledgeBase | null;
  profile: ProfileAnalyzer;
  researcher: TopicResearcher;
  generator: FlashcardGenerator;
  maxFlashcards?: number;
  now?: () => Date;
}

export type TopicFlashcardsDeps = Pick<PipelineDeps, 'researcher' | 'generator' | 'maxFlashcards' | 'now'>;

// ============================================
// Helpers
// ============================================

const BULLET_ITEM = /^\s*[-*•]\s+(.+)$/;
const NUMBERED_ITEM = /^\s*\d+[.)]\s+(.+)$/;

function cleanItem(text: string): string {
  return text.replace(/\*\*/g, '').replace(/:$/, '').trim();
}

function listItems(lines: readonly string[], pattern: RegExp): string[] {
  const items: string[] = [];
  for (const line of lines) {
    const match = pattern.exec(line);
    const item = match?.[1] ? cleanItem(match[1]) : '';
    if (item) items.push(item);
  }
  return items;
}

/**
 * Topics named in a profile summary: its bullet items, else its numbered
 * items, else the whole summary. Case-insensitive duplicates are dropped and
 * at most five topics are kept.
 */
export function deriveTopics(summary: string): string[] {
  const lines = summary.split(/\r?\n/);
  let items = listItems(lines, BULLET_ITEM);
  if (items.length === 0) items = listItems(lines, NUMBERED_ITEM);

  const seen = new Set<string>();
  const topics: string[] = [];
  for (const item of items) {
    const key = item.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    topics.push(item);
  }

  if (topics.length === 0) {
    const whole = summary.trim();
    return whole ? [whole] : [];
  }
  return topics.slice(0, MAX_DERIVED_TOPICS);
}

/** e.g. "Automated Flashcards from Profile Update - 2024-05-01 09:30" (UTC) */
export function automatedTopic(now: Date): string {
  const iso = now.toISOString();
  return `Automated Flashcards from Profile Update - ${iso.slice(0, 10)} ${iso.slice(11, 16)}`;
}

function skipped(stage: PipelineStage, reason: string): SkippedRun {
  console.log(`${LOG} Skipping at ${stage} stage: ${reason}`);
  return { status: 'skipped', stage, reason };
}

async function storeFlashcards(
  kb: KnowledgeBase | null,
  topic: string,
  flashcards: Flashcard[],
  source: string,
  now: Date
): Promise<boolean> {
  if (!kb) {
    console.error(`${LOG} No knowledge base available. Cannot store flashcards for '${topic}'.`);
    return false;
  }
  const stored = await addFlashcardSetToKb(kb, topic, flashcards, { source, now });
  if (!stored) {
    console.error(`${LOG} Failed to store flashcard set '${topic}' for ${kb.userId}.`);
  }
  return stored;
}

// ============================================
// Runs
// ============================================

/**
 * Run the full pipeline for a user whose knowledge base has new content.
 */
export async function runLearningPipeline(userId: string, deps: PipelineDeps): Promise<PipelineResult> {
  const now = deps.now ?? (() => new Date());
  console.log(`${LOG} Starting pipeline for user ${userId}`);

  const profile = await deps.profile.analyze(PROFILE_MAX_DOCS, '');
  if (!profile.ok) {
    return skipped('profile', profile.message);
  }
  if (!profile.summary.trim()) {
    return skipped('profile', 'Profile analysis returned an empty summary.');
  }

  const topics = deriveTopics(profile.summary);
  console.log(`${LOG} Derived ${topics.length} topic(s): ${topics.join(' | ')}`);

  const research = await deps.researcher.research(topics);
  if (!research.ok) {
    return skipped('research', research.message);
  }
  const researchLength = research.summary.trim().length;
  if (researchLength < MIN_PIPELINE_RESEARCH_CHARS) {
    return skipped('research', `Research output too short (${researchLength} chars).`);
  }

  const generated = await deps.generator.generate({
    text: research.summary,
    maxFlashcards: deps.maxFlashcards,
  });
  if (generated.flashcards.length === 0) {
    return skipped('flashcards', generated.error ?? 'No flashcards were generated.');
  }

  const at = now();
  const topic = automatedTopic(at);
  const stored = await storeFlashcards(deps.knowledgeBase, topic, generated.flashcards, AUTOMATED_SOURCE, at);

  console.log(`${LOG} Pipeline finished for ${userId}: ${generated.flashcards.length} flashcard(s), stored=${stored}`);
  return { status: 'completed', topic, flashcardCount: generated.flashcards.length, stored };
}

/**
 * Research a single topic, generate flashcards from it and store them.
 * Pass a null knowledge base to generate without storing.
 */
export async function generateFlashcardsForTopic(
  kb: KnowledgeBase | null,
  topic: string,
  deps: TopicFlashcardsDeps
): Promise<TopicFlashcardsResult> {
  const now = deps.now ?? (() => new Date());
  const subject = topic.trim();

  const research = await deps.researcher.research(subject);
  if (!research.ok) {
    return skipped('research', research.message);
  }
  const researchLength = research.summary.trim().length;
  if (researchLength < MIN_ON_DEMAND_RESEARCH_CHARS) {
    return skipped('research', `Research output too short (${researchLength} chars).`);
  }

  const generated = await deps.generator.generate({
    text: research.summary,
    topic: subject,
    maxFlashcards: deps.maxFlashcards,
  });
  if (generated.flashcards.length === 0) {
    return skipped('flashcards', generated.error ?? 'No flashcards were generated.');
  }

  const stored = kb
    ? await storeFlashcards(kb, subject, generated.flashcards, DEFAULT_FLASHCARD_SOURCE, now())
    : false;

  return {
    status: 'completed',
    topic: subject,
    flashcards: generated.flashcards,
    researchSnippet: research.summary.slice(0, RESEARCH_SNIPPET_CHARS),
    stored,
  };
}

// ============================================
// Wiring
// ============================================

export interface CreatePipelineOptions {
  config?: AppConfig;
  modelId?: string;
  model?: LanguageModel;
  embedder?: Embedder;
}

/**
 * Build the production dependencies for a user. Throws ConfigurationError
 * when the agent credential is missing.
 */
export function createPipelineDeps(userId: string, options: CreatePipelineOptions = {}): PipelineDeps {
  const config = options.config ?? loadConfig();
  const agentOptions = { config, modelId: options.modelId, model: options.model };

  const researcher = new ResearchAgent(agentOptions);
  const generator = new FlashcardGenerationAgent(agentOptions);
  const knowledgeBase = getUserKnowledgeBase(userId, { config, embedder: options.embedder });
  const profile = new LearningProfileAgent(userId, { ...agentOptions, knowledgeBase });

  return { knowledgeBase, profile, researcher, generator };
}
