/**
 * Primary generation strategy: a single Claude Agent SDK query() session
 * with no tools, asked to write the whole transcript as JSON.
 */

import { query } from '@anthropic-ai/claude-agent-sdk';
import type { SDKMessage } from '@anthropic-ai/claude-agent-sdk';
import {
  buildDiscussionPrompt,
  buildDiscussionSystemPrompt,
  parseTranscript,
  stampMessages,
} from './DiscussionPromptBuilder.js';
import type { IGenerationStrategy } from './interfaces/index.js';
import type { DiscussionMessage, GenerationRequest } from './types.js';

export interface AgentFrameworkStrategyOptions {
  apiKey?: string;
  model?: string;
  /** Upper bound on agent turns; the transcript needs exactly one */
  maxTurns?: number;
  now?: () => Date;
}

/**
 * The SDK's built-in tools. An empty allowedTools list removes none of
 * them, so each is denied by name.
 */
export const BUILT_IN_TOOLS = [
  'Agent',
  'Task',
  'Bash',
  'BashOutput',
  'KillShell',
  'Read',
  'Write',
  'Edit',
  'MultiEdit',
  'NotebookEdit',
  'Glob',
  'Grep',
  'WebFetch',
  'WebSearch',
  'TodoWrite',
  'ExitPlanMode',
  'SlashCommand',
  'ListMcpResources',
  'ReadMcpResource',
] as const;

/**
 * Build a clean environment for the spawned agent subprocess.
 * Strips the CLAUDECODE env var to allow nested sessions.
 */
function cleanEnv(apiKey: string): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (key === 'CLAUDECODE') continue;
    if (key === 'CLAUDE_CODE_SESSION') continue;
    if (value !== undefined) env[key] = value;
  }
  env.ANTHROPIC_API_KEY = apiKey;
  return env;
}

export class AgentFrameworkStrategy implements IGenerationStrategy {
  readonly name = 'agent-framework';
  readonly label = 'Asking the agent framework';
  private apiKey: string | undefined;
  private model: string | undefined;
  private maxTurns: number;
  private now: () => Date;

  constructor(options: AgentFrameworkStrategyOptions = {}) {
    this.apiKey = options.apiKey;
    this.model = options.model;
    this.maxTurns = options.maxTurns ?? 1;
    this.now = options.now ?? (() => new Date());
  }

  isAvailable(): boolean {
    return Boolean(this.apiKey);
  }

  async generate(request: GenerationRequest, signal: AbortSignal): Promise<DiscussionMessage[]> {
    if (!this.apiKey) throw new Error('Agent framework strategy has no API key');

    // Bridge the caller's signal onto the SDK's AbortController
    const abortController = new AbortController();
    const onAbort = () => abortController.abort();
    signal.addEventListener('abort', onAbort, { once: true });

    try {
      const q = query({
        prompt: buildDiscussionPrompt(request),
        options: {
          systemPrompt: buildDiscussionSystemPrompt(),
          model: this.model,
          env: cleanEnv(this.apiKey),
          allowedTools: [],
          disallowedTools: [...BUILT_IN_TOOLS],
          maxTurns: this.maxTurns,
          abortController,
          stderr: (data: string) => {
            if (data.trim()) {
              console.error(`[AgentFramework:stderr] ${data.trim()}`);
            }
          },
        },
      });

      const text = await this.consumeResult(q, abortController.signal);
      return stampMessages(parseTranscript(text, request.personas), this.now);
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }

  /**
   * Drain the session and return the final result text. The SDK reports
   * failures (turn limit, execution errors) as non-success result messages.
   */
  private async consumeResult(q: AsyncGenerator<SDKMessage, void>, signal: AbortSignal): Promise<string> {
    let resultText: string | null = null;

    for await (const message of q) {
      if (signal.aborted) break;
      if (message.type !== 'result') continue;

      if (message.subtype === 'success') {
        resultText = message.result;
      } else {
        throw new Error(`Agent session ended with ${message.subtype}`);
      }
    }

    if (signal.aborted) throw new Error('Agent session aborted');
    if (resultText === null) throw new Error('Agent session ended without a result');
    return resultText;
  }
}
