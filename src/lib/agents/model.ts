/**
 * Language-model capability shared by the agents.
 *
 * Agents depend on the LanguageModel interface only; AnthropicLanguageModel
 * is the production implementation over the Claude Messages API.
 */

import Anthropic from '@anthropic-ai/sdk';
import { loadConfig, requireCredential, type AppConfig } from '@/lib/config';

const DEFAULT_MAX_TOKENS = 2048;

export interface InvokeOptions {
  system?: string;
  maxTokens?: number;
  /** Let the model run web searches before answering */
  webSearch?: { maxUses: number };
}

export interface LanguageModel {
  readonly modelId: string;
  invoke(prompt: string, options?: InvokeOptions): Promise<string>;
}

export interface AnthropicModelOptions {
  modelId: string;
  apiKey: string;
  timeoutMs?: number;
}

export class AnthropicLanguageModel implements LanguageModel {
  readonly modelId: string;
  private client: Anthropic;

  constructor(options: AnthropicModelOptions) {
    this.modelId = options.modelId;
    this.client = new Anthropic({
      apiKey: options.apiKey,
      timeout: options.timeoutMs,
      maxRetries: 0,
    });
  }

  async invoke(prompt: string, options: InvokeOptions = {}): Promise<string> {
    const response = await this.client.messages.create({
      model: this.modelId,
      max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
      system: options.system,
      tools: options.webSearch
        ? [{ type: 'web_search_20250305', name: 'web_search', max_uses: options.webSearch.maxUses }]
        : undefined,
      messages: [
        {
          role: 'user',
          content: prompt,
        },
      ],
    });

    // Server-side tool calls interleave with text; only the text is the answer
    const text = response.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('')
      .trim();

    if (!text) {
      throw new Error('Unexpected response from Claude: no text content');
    }

    return text;
  }
}

export interface AgentOptions {
  config?: AppConfig;
  /** Defaults to the configured AGENT_MODEL */
  modelId?: string;
  /** Use this model instead of building the Anthropic client */
  model?: LanguageModel;
}

/**
 * Resolve the model an agent talks to. The Anthropic credential is required
 * even when a model is injected: an agent without it is a configuration error.
 */
export function resolveAgentModel(component: string, options: AgentOptions): LanguageModel {
  const config = options.config ?? loadConfig();
  const apiKey = requireCredential(config.credentials, 'ANTHROPIC_API_KEY', component);

  return (
    options.model ??
    new AnthropicLanguageModel({
      modelId: options.modelId ?? config.agentModel,
      apiKey,
      timeoutMs: config.llmTimeoutMs,
    })
  );
}
