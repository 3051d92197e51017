/**
 * Research Agent
 * Researches topics with the model's web search tool and returns a synthesized summary.
 */

import { errorMessage } from '@/lib/errors';
import { resolveAgentModel, type AgentOptions, type LanguageModel } from './model';

const LOG = '[ResearchAgent]';

export const NO_TOPICS_MESSAGE = 'No topics provided for research.';
export const INVALID_TOPICS_MESSAGE = 'Invalid input: Topics must be a string or a list of strings.';

const MAX_SEARCHES = 5;

const SYSTEM_PROMPT = `You are a research assistant. Use your web search tool to gather detailed, up-to-date information on the topics you are given, then synthesize the findings into a comprehensive summary.
For each topic:
1. Search for relevant and reliable information.
2. Extract the key facts, explanations and supporting details.
3. Write a coherent summary, mentioning source URLs where useful.
If several topics are given, address each one clearly and separately.`;

/** One topic, or an ordered list of them */
export type TopicInput = string | readonly string[];

export type ResearchOutcome =
  | { ok: true; summary: string; topics: string[] }
  | { ok: false; reason: 'invalid-input' | 'no-topics' | 'model-error'; message: string };

export interface TopicResearcher {
  research(topics: TopicInput): Promise<ResearchOutcome>;
}

/**
 * Normalise topic input to a list of non-blank topics, or null when the
 * value is neither a string nor a list of strings.
 */
export function normalizeTopics(topics: unknown): string[] | null {
  if (typeof topics === 'string') {
    return topics.trim() ? [topics.trim()] : [];
  }
  if (Array.isArray(topics) && topics.every((topic): topic is string => typeof topic === 'string')) {
    return topics.map((topic) => topic.trim()).filter(Boolean);
  }
  return null;
}

export function buildResearchPrompt(topics: readonly string[]): string {
  if (topics.length === 1) {
    return `Please conduct thorough research on the following topic: '${topics[0]}'.
Use your search tool to gather information, then provide a detailed summary.`;
  }

  const list = topics.map((topic, i) => `${i + 1}. ${topic}`).join('\n');
  return `Please conduct thorough research on each of the following topics:
${list}

Use your search tool to gather information, then provide a detailed summary addressing each topic. Make sure every listed topic is covered.`;
}

/**
 * Heuristic only: flags responses where the model apologises for finding nothing.
 */
export function looksLikeSearchFailure(text: string): boolean {
  const lower = text.toLowerCase();
  return lower.includes('sorry') && lower.includes('unable to find information');
}

export class ResearchAgent implements TopicResearcher {
  private model: LanguageModel;

  constructor(options: AgentOptions = {}) {
    this.model = resolveAgentModel('ResearchAgent', options);
  }

  get modelId(): string {
    return this.model.modelId;
  }

  async research(topics: TopicInput): Promise<ResearchOutcome> {
    const normalized = normalizeTopics(topics);
    if (!normalized) {
      return { ok: false, reason: 'invalid-input', message: INVALID_TOPICS_MESSAGE };
    }
    if (normalized.length === 0) {
      return { ok: false, reason: 'no-topics', message: NO_TOPICS_MESSAGE };
    }

    console.log(`${LOG} Researching ${normalized.join(', ')} with ${this.model.modelId}...`);

    let summary: string;
    try {
      summary = await this.model.invoke(buildResearchPrompt(normalized), {
        system: SYSTEM_PROMPT,
        webSearch: { maxUses: MAX_SEARCHES },
      });
    } catch (error) {
      console.error(`${LOG} Error during research: ${errorMessage(error)}`);
      return {
        ok: false,
        reason: 'model-error',
        message: `Failed to conduct research due to an error: ${errorMessage(error)}`,
      };
    }

    if (looksLikeSearchFailure(summary)) {
      console.warn(`${LOG} Model indicated it may have had trouble finding information.`);
    }

    return { ok: true, summary, topics: normalized };
  }

  /**
   * Research summary text, or the explanatory message when research could not run.
   */
  async researchTopics(topics: TopicInput): Promise<string> {
    const result = await this.research(topics);
    return result.ok ? result.summary : result.message;
  }
}
