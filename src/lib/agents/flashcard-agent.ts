/**
 * Flashcard Generation Agent
 * Turns research text into question/answer flashcards via the language model.
 */

import { z } from 'zod';
import { errorMessage } from '@/lib/errors';
import { parseJson } from '@/lib/json';
import { FlashcardListSchema, type Flashcard } from '@/types';
import { resolveAgentModel, type AgentOptions, type LanguageModel } from './model';

const LOG = '[FlashcardAgent]';

export const EMPTY_TEXT_MESSAGE = 'Input text is empty. Cannot generate flashcards.';
export const UNPARSABLE_RESPONSE_MESSAGE = 'Failed to parse flashcards: model response is not valid JSON.';
export const UNEXPECTED_STRUCTURE_MESSAGE =
  'Failed to parse flashcards: expected a list of {question, answer} objects.';
export const NO_FLASHCARDS_MESSAGE = 'Model returned no flashcards.';
export const INVALID_MAX_FLASHCARDS_MESSAGE = 'Maximum number of flashcards must be a positive integer.';

const DEFAULT_MAX_FLASHCARDS = 10;

const SYSTEM_PROMPT = `You create educational flashcards (question and answer pairs) from a given text.

## Rules
1. One concept per card, each testing a single verifiable piece of information
2. Questions must be clear and test understanding of key information
3. Answers must be accurate and derived strictly from the provided text

## Output Format
Return a JSON object with a single "flashcards" key:
{"flashcards": [{"question": "What is concept X?", "answer": "Concept X is defined as..."}]}

Respond with only the JSON object, no markdown and no leading or trailing text.`;

const FLASHCARD_PROMPT = `Generate up to {{MAX}} flashcards{{TOPIC}} from the following text.

--- TEXT START ---
{{TEXT}}
--- TEXT END ---

Remember to output only the JSON object.`;

export interface FlashcardRequest {
  text: string;
  topic?: string;
  maxFlashcards?: number;
}

export interface FlashcardGenerationResult {
  flashcards: Flashcard[];
  /** Set whenever no usable flashcards were produced */
  error?: string;
}

export interface FlashcardGenerator {
  generate(request: FlashcardRequest): Promise<FlashcardGenerationResult>;
}

// ============================================
// Response parsing
// ============================================

const WrappedFlashcardsSchema = z.object({ flashcards: z.array(z.unknown()) });

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)```/i;

/**
 * The JSON payload inside a model response: the body of a fenced block if
 * present, otherwise the text itself, otherwise the outermost {...} or [...].
 */
function extractJson(response: string): unknown {
  const fenced = FENCED_BLOCK.exec(response);
  const candidate = (fenced?.[1] ?? response).trim();

  const direct = parseJson(candidate);
  if (direct !== undefined) return direct;

  const starts = [candidate.indexOf('{'), candidate.indexOf('[')].filter((i) => i !== -1);
  if (starts.length === 0) return undefined;

  const start = Math.min(...starts);
  const end = candidate.lastIndexOf(candidate[start] === '{' ? '}' : ']');
  if (end <= start) return undefined;

  return parseJson(candidate.slice(start, end + 1));
}

function isValidMax(maxFlashcards: number): boolean {
  return Number.isInteger(maxFlashcards) && maxFlashcards > 0;
}

/**
 * Parse a model response into at most `maxFlashcards` cards. Accepts a bare
 * array or {"flashcards": [...]}; anything else yields no cards and an error.
 */
export function parseFlashcardResponse(
  response: string,
  maxFlashcards: number = DEFAULT_MAX_FLASHCARDS
): FlashcardGenerationResult {
  if (!isValidMax(maxFlashcards)) {
    return { flashcards: [], error: INVALID_MAX_FLASHCARDS_MESSAGE };
  }

  const json = extractJson(response);
  if (json === undefined) {
    return { flashcards: [], error: UNPARSABLE_RESPONSE_MESSAGE };
  }

  const wrapped = WrappedFlashcardsSchema.safeParse(json);
  const list: unknown = wrapped.success ? wrapped.data.flashcards : json;

  const parsed = FlashcardListSchema.safeParse(list);
  if (!parsed.success) {
    return { flashcards: [], error: UNEXPECTED_STRUCTURE_MESSAGE };
  }
  if (parsed.data.length === 0) {
    return { flashcards: [], error: NO_FLASHCARDS_MESSAGE };
  }

  return { flashcards: parsed.data.slice(0, maxFlashcards) };
}

// ============================================
// Agent
// ============================================

export class FlashcardGenerationAgent implements FlashcardGenerator {
  private model: LanguageModel;

  constructor(options: AgentOptions = {}) {
    this.model = resolveAgentModel('FlashcardGenerationAgent', options);
  }

  get modelId(): string {
    return this.model.modelId;
  }

  async generate({
    text,
    topic,
    maxFlashcards = DEFAULT_MAX_FLASHCARDS,
  }: FlashcardRequest): Promise<FlashcardGenerationResult> {
    if (!text.trim()) {
      return { flashcards: [], error: EMPTY_TEXT_MESSAGE };
    }
    if (!isValidMax(maxFlashcards)) {
      return { flashcards: [], error: INVALID_MAX_FLASHCARDS_MESSAGE };
    }

    const prompt = FLASHCARD_PROMPT.replace('{{MAX}}', String(maxFlashcards))
      .replace('{{TOPIC}}', () => (topic ? ` about "${topic}"` : ''))
      .replace('{{TEXT}}', () => text);

    console.log(`${LOG} Generating flashcards from ${text.length} chars using ${this.model.modelId}...`);

    let response: string;
    try {
      response = await this.model.invoke(prompt, { system: SYSTEM_PROMPT });
    } catch (error) {
      console.error(`${LOG} Error during flashcard generation: ${errorMessage(error)}`);
      return {
        flashcards: [],
        error: `Failed to generate flashcards due to an error: ${errorMessage(error)}`,
      };
    }

    const result = parseFlashcardResponse(response, maxFlashcards);
    if (result.error) {
      console.warn(`${LOG} ${result.error} Raw response starts with: ${response.slice(0, 200)}`);
    }
    return result;
  }
}
