/**
 * Learning agents: profile analysis, topic research and flashcard generation.
 */

export type { AgentOptions, InvokeOptions, LanguageModel } from './model';
export { AnthropicLanguageModel, resolveAgentModel } from './model';

export type { ProfileAgentOptions, ProfileAnalysis, ProfileAnalyzer } from './profile-agent';
export { DOCUMENT_SEPARATOR, LearningProfileAgent } from './profile-agent';

export type { ResearchOutcome, TopicInput, TopicResearcher } from './research-agent';
export { ResearchAgent, buildResearchPrompt, normalizeTopics } from './research-agent';

export type {
  FlashcardGenerationResult,
  FlashcardGenerator,
  FlashcardRequest,
} from './flashcard-agent';
export { FlashcardGenerationAgent, parseFlashcardResponse } from './flashcard-agent';
