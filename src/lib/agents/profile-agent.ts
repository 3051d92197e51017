/**
 * Learning Profile Agent
 * Reads a user's knowledge base and summarises their learning interests.
 */

import { errorMessage } from '@/lib/errors';
import { getUserKnowledgeBase, queryKnowledgeBase } from '@/lib/kb/knowledge-base';
import type { KnowledgeBase } from '@/lib/kb/types';
import { resolveAgentModel, type AgentOptions, type LanguageModel } from './model';

const LOG = '[ProfileAgent]';

export const KB_UNAVAILABLE_MESSAGE = 'Could not analyze user profile: Knowledge Base not available.';
export const NO_DOCUMENTS_MESSAGE = "No documents found in the user's knowledge base. Cannot analyze profile.";
export const NO_TEXT_MESSAGE = 'Retrieved documents have no text content. Cannot analyze profile.';

/** Separates documents in the model context; distinct from in-content newlines */
export const DOCUMENT_SEPARATOR = '\n\n---\n\n';

const DEFAULT_MAX_DOCS = 50;

const SYSTEM_PROMPT = `You analyse a user's stored documents to identify their learning interests, key topics and areas of expertise.
Focus on what the user is trying to learn or already knows well.`;

const PROFILE_PROMPT = `The following text is a collection of documents from a user's knowledge base.
Analyse it and write a learning profile summary covering:
1. Main topics and concepts of interest.
2. Specific keywords, technologies or skills mentioned.
3. Potential learning goals or areas of deep knowledge.
4. Any recurring themes or questions.

List each main topic as its own bullet point ("- topic").

User's Documents:
{{DOCUMENTS}}

End of User's Documents. Begin Profile Summary:`;

export type ProfileAnalysis =
  | { ok: true; summary: string; documentCount: number }
  | { ok: false; reason: 'kb-unavailable' | 'no-documents' | 'no-text' | 'model-error'; message: string };

export interface ProfileAnalyzer {
  analyze(maxDocs?: number, queryText?: string): Promise<ProfileAnalysis>;
}

export interface ProfileAgentOptions extends AgentOptions {
  /** Pre-opened knowledge base; null means none is available */
  knowledgeBase?: KnowledgeBase | null;
}

export class LearningProfileAgent implements ProfileAnalyzer {
  readonly userId: string;
  readonly knowledgeBase: KnowledgeBase | null;
  private model: LanguageModel;

  constructor(userId: string, options: ProfileAgentOptions = {}) {
    this.userId = userId;
    this.model = resolveAgentModel('LearningProfileAgent', options);
    this.knowledgeBase =
      options.knowledgeBase !== undefined
        ? options.knowledgeBase
        : getUserKnowledgeBase(userId, { config: options.config });

    if (!this.knowledgeBase) {
      console.warn(`${LOG} Knowledge base could not be initialized for user ${userId}. Analysis will be limited.`);
    }
  }

  get modelId(): string {
    return this.model.modelId;
  }

  async analyze(maxDocs: number = DEFAULT_MAX_DOCS, queryText: string = ''): Promise<ProfileAnalysis> {
    if (!this.knowledgeBase) {
      return { ok: false, reason: 'kb-unavailable', message: KB_UNAVAILABLE_MESSAGE };
    }

    const documents = await queryKnowledgeBase(this.knowledgeBase, queryText, maxDocs);
    if (documents.length === 0) {
      return { ok: false, reason: 'no-documents', message: NO_DOCUMENTS_MESSAGE };
    }

    const contents = documents.map((doc) => doc.content).filter((content) => content.trim());
    if (contents.length === 0) {
      return { ok: false, reason: 'no-text', message: NO_TEXT_MESSAGE };
    }

    const prompt = PROFILE_PROMPT.replace('{{DOCUMENTS}}', () => contents.join(DOCUMENT_SEPARATOR));
    console.log(`${LOG} Sending ${contents.length} document(s) to ${this.model.modelId} for user ${this.userId}...`);

    try {
      const summary = await this.model.invoke(prompt, { system: SYSTEM_PROMPT });
      return { ok: true, summary, documentCount: contents.length };
    } catch (error) {
      console.error(`${LOG} Error during LLM interaction: ${errorMessage(error)}`);
      return {
        ok: false,
        reason: 'model-error',
        message: `Failed to generate profile due to LLM error: ${errorMessage(error)}`,
      };
    }
  }

  /**
   * Profile summary text, or the explanatory message when no profile could be built.
   */
  async analyzeUserProfile(maxDocs: number = DEFAULT_MAX_DOCS, queryText: string = ''): Promise<string> {
    const result = await this.analyze(maxDocs, queryText);
    return result.ok ? result.summary : result.message;
  }
}
