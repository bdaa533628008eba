import { z } from 'zod';
import { MalformedOutputError } from './errors.js';
import { SYSTEM_SPEAKER } from './types.js';
import type { DiscussionMessage, GenerationRequest, Persona } from './types.js';

/** Turns each persona takes in a generated transcript. */
export const TURNS_PER_PERSONA = 2;

/**
 * Opening line every transcript starts with, whichever strategy produced
 * the rest.
 */
export function composeOpening(theme: string): string {
  return `Opening the discussion on "${theme}". Each participant will share their view in turn.`;
}

function describePersona(p: Persona): string {
  const lines = [`- ${p.name}: ${p.description}`];
  if (p.personality) lines.push(`  Personality: ${p.personality}`);
  if (p.background) lines.push(`  Background: ${p.background}`);
  for (const [key, value] of Object.entries(p.traits)) {
    lines.push(`  ${key}: ${typeof value === 'string' ? value : JSON.stringify(value)}`);
  }
  return lines.join('\n');
}

export function buildDiscussionSystemPrompt(): string {
  return `You write simulated brainstorming discussions between fictional characters.
Stay in character for every speaker, let them react to one another, and keep each turn to 1-4 sentences.
Respond with JSON only, without prose or code fences.`;
}

export function buildDiscussionPrompt(request: GenerationRequest): string {
  const { theme, description, world, personas } = request;
  const turns = personas.length * TURNS_PER_PERSONA;

  return `WORLD: ${world.name}
${world.background}

THEME: ${theme}
DETAILS: ${description || '(none)'}

PARTICIPANTS:
${personas.map(describePersona).join('\n')}

Write the discussion as about ${turns} turns, speakers taking turns in a natural order.
Every speaker must be one of: ${personas.map((p) => JSON.stringify(p.name)).join(', ')}.

Respond with a JSON object of this exact shape:
{"messages": [{"speaker": "<participant name>", "content": "<what they say>"}]}`;
}

// ── Parsing ───────────────────────────────────────────────────────────────────

const TranscriptLine = z.object({
  speaker: z.string().min(1),
  content: z.string().trim().min(1),
});

const Transcript = z.union([
  z.array(TranscriptLine),
  z.object({ messages: z.array(TranscriptLine) }),
]);

export type TranscriptDraft = z.infer<typeof TranscriptLine>;

/** Pull the JSON payload out of a model reply that may wrap it in prose or fences. */
function extractJson(text: string): unknown {
  const trimmed = text.trim();
  const fenced = /```(?:json)?\s*([\s\S]*?)```/.exec(trimmed);
  const body = fenced ? fenced[1].trim() : trimmed;
  const start = body.search(/[[{]/);
  if (start < 0) throw new MalformedOutputError('Reply contains no JSON');
  const end = Math.max(body.lastIndexOf(']'), body.lastIndexOf('}'));
  try {
    return JSON.parse(body.slice(start, end + 1));
  } catch {
    throw new MalformedOutputError('Reply is not valid JSON');
  }
}

/**
 * Parse and validate a model reply into speaker/content drafts. Speaker
 * names are matched case-insensitively against the roster and normalised to
 * the roster spelling.
 */
export function parseTranscript(text: string, personas: Persona[]): TranscriptDraft[] {
  const parsed = Transcript.safeParse(extractJson(text));
  if (!parsed.success) {
    throw new MalformedOutputError(`Reply does not match the transcript shape: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
  }
  const lines = Array.isArray(parsed.data) ? parsed.data : parsed.data.messages;
  if (lines.length === 0) throw new MalformedOutputError('Transcript is empty');

  const roster = new Map<string, string>();
  for (const p of personas) roster.set(p.name.toLowerCase(), p.name);
  roster.set(SYSTEM_SPEAKER, SYSTEM_SPEAKER);

  return lines.map((line, i) => {
    const speaker = roster.get(line.speaker.trim().toLowerCase());
    if (!speaker) {
      throw new MalformedOutputError(`Line ${i + 1} has unknown speaker "${line.speaker}"`);
    }
    return { speaker, content: line.content.trim() };
  });
}

/** Timestamp drafts in arrival order. */
export function stampMessages(drafts: TranscriptDraft[], now: () => Date = () => new Date()): DiscussionMessage[] {
  return drafts.map((d) => ({ speaker: d.speaker, content: d.content, timestamp: now().toISOString() }));
}
