import OpenAI from 'openai';
import type { ChatCompletion, ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import {
  buildDiscussionPrompt,
  buildDiscussionSystemPrompt,
  parseTranscript,
  stampMessages,
} from './DiscussionPromptBuilder.js';
import type { IGenerationStrategy } from './interfaces/index.js';
import type { DiscussionMessage, GenerationRequest } from './types.js';

/** The slice of the OpenAI client the app calls. */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming, options?: { signal?: AbortSignal }): Promise<ChatCompletion>;
    };
  };
}

export function createChatClient(apiKey: string | undefined): ChatCompletionClient | null {
  return apiKey ? new OpenAI({ apiKey, maxRetries: 1 }) : null;
}

export interface CompletionApiStrategyOptions {
  apiKey?: string;
  model: string;
  temperature?: number;
  now?: () => Date;
  /** Injected for tests; built from apiKey otherwise */
  client?: ChatCompletionClient;
}

/**
 * Fallback strategy: one chat completion in JSON mode.
 */
export class CompletionApiStrategy implements IGenerationStrategy {
  readonly name = 'completion-api';
  readonly label = 'Asking the completion API';
  private client: ChatCompletionClient | null;
  private model: string;
  private temperature: number;
  private now: () => Date;

  constructor(options: CompletionApiStrategyOptions) {
    this.model = options.model;
    this.temperature = options.temperature ?? 0.8;
    this.now = options.now ?? (() => new Date());
    this.client = options.client ?? createChatClient(options.apiKey);
  }

  isAvailable(): boolean {
    return this.client !== null;
  }

  async generate(request: GenerationRequest, signal: AbortSignal): Promise<DiscussionMessage[]> {
    if (!this.client) throw new Error('Completion API strategy has no client');

    const completion = await this.client.chat.completions.create(
      {
        model: this.model,
        temperature: this.temperature,
        response_format: { type: 'json_object' },
        messages: [
          { role: 'system', content: buildDiscussionSystemPrompt() },
          { role: 'user', content: buildDiscussionPrompt(request) },
        ],
      },
      { signal },
    );

    const text = completion.choices[0]?.message?.content;
    if (!text) throw new Error('Completion returned no content');
    return stampMessages(parseTranscript(text, request.personas), this.now);
  }
}
