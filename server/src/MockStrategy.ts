import { pause } from './utils/abortable.js';
import type { IGenerationStrategy } from './interfaces/index.js';
import type { DiscussionMessage, GenerationRequest, Persona } from './types.js';

export interface MockStrategyOptions {
  /** Simulated latency before each turn (ms) */
  turnDelayMs?: number;
  now?: () => Date;
}

function firstTake(p: Persona, theme: string): string {
  const temperament = p.personality || 'open-minded';
  const focus = p.description || 'what this means for the people involved';
  return `Speaking as someone ${temperament}, my first thought on "${theme}" is about ${focus}.`;
}

function followUp(p: Persona, previous: Persona, theme: string): string {
  return `Building on what ${previous.name} said, ${p.name} would add one concrete next step for "${theme}" before we move on.`;
}

function closing(theme: string): string {
  return `To wrap up my thoughts on "${theme}": I'd test the simplest version first and learn from it.`;
}

/**
 * Deterministic scripted exchange: every persona gives a first take, then
 * each responds to the one before. Always available and never fails, so a
 * discussion run always terminates. When aborted it stops pausing and
 * returns the rest of the script at once.
 */
export class MockStrategy implements IGenerationStrategy {
  readonly name = 'mock';
  readonly label = 'Scripting a sample discussion';
  private turnDelayMs: number;
  private now: () => Date;

  constructor(options: MockStrategyOptions = {}) {
    this.turnDelayMs = options.turnDelayMs ?? 0;
    this.now = options.now ?? (() => new Date());
  }

  isAvailable(): boolean {
    return true;
  }

  async generate(request: GenerationRequest, signal: AbortSignal): Promise<DiscussionMessage[]> {
    const script = MockStrategy.script(request);
    const messages: DiscussionMessage[] = [];
    for (const line of script) {
      await pause(this.turnDelayMs, signal);
      messages.push({ ...line, timestamp: this.now().toISOString() });
    }
    return messages;
  }

  /** The speaker/content lines the mock produces for a request, in order. */
  static script(request: GenerationRequest): Array<Pick<DiscussionMessage, 'speaker' | 'content'>> {
    const { theme, personas } = request;
    const lines = personas.map((p) => ({ speaker: p.name, content: firstTake(p, theme) }));

    if (personas.length === 1) {
      lines.push({ speaker: personas[0].name, content: closing(theme) });
      return lines;
    }
    personas.forEach((p, i) => {
      const previous = personas[(i + personas.length - 1) % personas.length];
      lines.push({ speaker: p.name, content: followUp(p, previous, theme) });
    });
    return lines;
  }
}
