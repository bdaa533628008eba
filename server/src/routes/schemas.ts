import { z } from 'zod';

export const IdParam = z.coerce.number().int().positive();

export const ListQuery = z.object({
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

export const WorldScopedListQuery = ListQuery.extend({
  world_id: z.coerce.number().int().positive().optional(),
});

const name = z.string().trim().min(1, 'name is required');

// ── Worlds ──

export const WorldCreate = z.object({
  name,
  description: z.string().default(''),
  background: z.string().default(''),
});

export const WorldUpdate = z.object({
  name: name.optional(),
  description: z.string().optional(),
  background: z.string().optional(),
});

export const WorldGenerate = z.object({
  keywords: z.string().trim().min(1, 'keywords are required'),
  generate_characters: z.boolean().default(true),
  character_count: z.number().int().min(1).max(10).default(3),
});

/** Query-string form of WorldGenerate, for EventSource clients. */
export const WorldGenerateQuery = z.object({
  keywords: z.string().trim().min(1, 'keywords are required'),
  generate_characters: z
    .enum(['true', 'false'])
    .default('true')
    .transform((value) => value === 'true'),
  character_count: z.coerce.number().int().min(1).max(10).default(3),
});

// ── Characters ──

const personaConfig = z.record(z.unknown()).nullable();

export const CharacterCreate = z.object({
  world_id: z.number().int().positive(),
  name,
  description: z.string().default(''),
  personality: z.string().default(''),
  background: z.string().default(''),
  persona_config: personaConfig.default(null),
});

export const CharacterUpdate = z.object({
  name: name.optional(),
  description: z.string().optional(),
  personality: z.string().optional(),
  background: z.string().optional(),
  persona_config: personaConfig.optional(),
});

// ── Discussions ──

export const DiscussionCreate = z.object({
  world_id: z.number().int().positive(),
  theme: z.string().trim().min(1, 'theme is required'),
  description: z.string().default(''),
});

/** Only a reset to `pending` is accepted for status; the engine owns the rest. */
export const DiscussionUpdate = z.object({
  theme: z.string().trim().min(1).optional(),
  description: z.string().optional(),
  status: z.literal('pending').optional(),
});
