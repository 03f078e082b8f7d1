export type { Space, SpaceRegistryOptions } from './types';
export { SpaceNotFoundError } from './types';
export { SpaceRegistry } from './space-registry';
