export type {
  IDiscussionStore,
  WorldInput,
  CharacterInput,
  DiscussionInput,
  DiscussionPatch,
  ListOptions,
} from './IDiscussionStore.js';
export type { IGenerationStrategy } from './IGenerationStrategy.js';
export type { IProgressRegistry, ISubscription } from './IProgressRegistry.js';
