/**
 * Board Space Types
 */

/**
 * A named location on the board, placed on a 2D plane.
 */
export interface Space {
  /** Unique name, used to look the space up */
  name: string;
  /** x, y position for layout */
  position: readonly [number, number];
}

export interface SpaceRegistryOptions {
  /** Refuse connections that would let a route loop back on itself */
  acyclic?: boolean;
}

/**
 * Thrown when a space name is not registered.
 */
export class SpaceNotFoundError extends Error {
  constructor(
    public readonly spaceName: string,
    public readonly known: readonly string[]
  ) {
    super(`Space "${spaceName}" was not found in [${known.join(', ')}]`);
    this.name = 'SpaceNotFoundError';
  }
}
