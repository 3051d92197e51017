import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigurationError } from '@/lib/config';
import { ScriptedModel, testConfig } from '@/test/fakes';

const { create, AnthropicClient } = vi.hoisted(() => {
  const create = vi.fn();
  const AnthropicClient = vi.fn(function () {
    return { messages: { create } };
  });
  return { create, AnthropicClient };
});

vi.mock('@anthropic-ai/sdk', () => ({ default: AnthropicClient }));

import { AnthropicLanguageModel, resolveAgentModel } from './model';

beforeEach(() => {
  create.mockReset();
  AnthropicClient.mockClear();
});

describe('AnthropicLanguageModel', () => {
  it('builds a client without automatic retries', () => {
    new AnthropicLanguageModel({ modelId: 'claude-test', apiKey: 'test-secret', timeoutMs: 1000 });

    expect(AnthropicClient).toHaveBeenCalledWith({ apiKey: 'test-secret', timeout: 1000, maxRetries: 0 });
  });

  it('sends one user message and joins the text blocks', async () => {
    create.mockResolvedValue({
      content: [
        { type: 'text', text: 'Hello' },
        { type: 'server_tool_use', id: 'tool-1', name: 'web_search', input: {} },
        { type: 'text', text: ' world' },
      ],
    });
    const model = new AnthropicLanguageModel({ modelId: 'claude-test', apiKey: 'test-secret' });

    expect(await model.invoke('Hi', { system: 'Be brief' })).toBe('Hello world');
    expect(create).toHaveBeenCalledWith({
      model: 'claude-test',
      max_tokens: 2048,
      system: 'Be brief',
      tools: undefined,
      messages: [{ role: 'user', content: 'Hi' }],
    });
  });

  it('enables the web search tool on request', async () => {
    create.mockResolvedValue({ content: [{ type: 'text', text: 'Found it' }] });
    const model = new AnthropicLanguageModel({ modelId: 'claude-test', apiKey: 'test-secret' });

    await model.invoke('Research this', { webSearch: { maxUses: 5 }, maxTokens: 4096 });

    expect(create).toHaveBeenCalledWith(
      expect.objectContaining({
        max_tokens: 4096,
        tools: [{ type: 'web_search_20250305', name: 'web_search', max_uses: 5 }],
      })
    );
  });

  it('rejects a reply without text', async () => {
    create.mockResolvedValue({ content: [] });
    const model = new AnthropicLanguageModel({ modelId: 'claude-test', apiKey: 'test-secret' });

    await expect(model.invoke('Hi')).rejects.toThrow('Unexpected response from Claude: no text content');
  });

  it('lets API errors propagate to the agent', async () => {
    create.mockRejectedValue(new Error('529 overloaded'));
    const model = new AnthropicLanguageModel({ modelId: 'claude-test', apiKey: 'test-secret' });

    await expect(model.invoke('Hi')).rejects.toThrow('529 overloaded');
  });
});

describe('resolveAgentModel', () => {
  it('returns an injected model once the credential is present', () => {
    const model = new ScriptedModel();
    expect(resolveAgentModel('TestAgent', { config: testConfig(), model })).toBe(model);
  });

  it('builds the configured Anthropic model by default', () => {
    const model = resolveAgentModel('TestAgent', { config: testConfig({ AGENT_MODEL: 'claude-configured' }) });

    expect(model).toBeInstanceOf(AnthropicLanguageModel);
    expect(model.modelId).toBe('claude-configured');
    expect(AnthropicClient).toHaveBeenCalledWith({ apiKey: 'test-anthropic-key', timeout: 120000, maxRetries: 0 });
  });

  it('prefers an explicit model id', () => {
    expect(resolveAgentModel('TestAgent', { config: testConfig(), modelId: 'claude-other' }).modelId).toBe(
      'claude-other'
    );
  });

  it('throws a ConfigurationError without the credential', () => {
    const config = testConfig({ ANTHROPIC_API_KEY: 'your_anthropic_api_key_here' });

    expect(() => resolveAgentModel('TestAgent', { config, model: new ScriptedModel() })).toThrow(
      'ANTHROPIC_API_KEY not found or is a placeholder. TestAgent cannot operate without it.'
    );
    expect(() => resolveAgentModel('TestAgent', { config })).toThrow(ConfigurationError);
  });
});
