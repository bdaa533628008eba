import type {
  CharacterRecord,
  DiscussionRecord,
  DiscussionResult,
  DiscussionStatus,
  WorldRecord,
} from '../types.js';

export type WorldInput = Pick<WorldRecord, 'name' | 'description' | 'background'>;
export type CharacterInput = Pick<
  CharacterRecord,
  'world_id' | 'name' | 'description' | 'personality' | 'background' | 'persona_config'
>;
export type DiscussionInput = Pick<DiscussionRecord, 'world_id' | 'theme' | 'description'>;

export interface DiscussionPatch {
  theme?: string;
  description?: string;
  status?: DiscussionStatus;
  result?: DiscussionResult | null;
}

export interface ListOptions {
  skip?: number;
  limit?: number;
}

/**
 * Durable store for worlds, characters and discussions. Update and delete
 * operations throw NotFoundError for unknown ids; get operations return null.
 */
export interface IDiscussionStore {
  load(): Promise<void>;
  close(): Promise<void>;

  listWorlds(options?: ListOptions): Promise<WorldRecord[]>;
  getWorld(id: number): Promise<WorldRecord | null>;
  createWorld(input: WorldInput): Promise<WorldRecord>;
  updateWorld(id: number, patch: Partial<WorldInput>): Promise<WorldRecord>;
  /** Also removes the world's characters and discussions. */
  deleteWorld(id: number): Promise<void>;

  listCharacters(worldId?: number, options?: ListOptions): Promise<CharacterRecord[]>;
  getCharacter(id: number): Promise<CharacterRecord | null>;
  createCharacter(input: CharacterInput): Promise<CharacterRecord>;
  updateCharacter(id: number, patch: Partial<Omit<CharacterInput, 'world_id'>>): Promise<CharacterRecord>;
  deleteCharacter(id: number): Promise<void>;

  listDiscussions(worldId?: number, options?: ListOptions): Promise<DiscussionRecord[]>;
  getDiscussion(id: number): Promise<DiscussionRecord | null>;
  createDiscussion(input: DiscussionInput): Promise<DiscussionRecord>;
  updateDiscussion(id: number, patch: DiscussionPatch): Promise<DiscussionRecord>;
  deleteDiscussion(id: number): Promise<void>;
}
