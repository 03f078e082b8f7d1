/**
 * SpaceRegistry
 *
 * Registers board spaces by name and connects them through a directed graph.
 * With `acyclic: true` the connections form a partial order and a connection
 * that would loop back is refused with a CycleError.
 */

import { Graph, PartialOrder, type Digraph } from '../graph';
import { SpaceNotFoundError, type Space, type SpaceRegistryOptions } from './types';

export class SpaceRegistry<TSpace extends Space = Space> {
  private readonly graph: Digraph<TSpace>;
  private readonly byName: Map<string, TSpace> = new Map();

  constructor(options: SpaceRegistryOptions = {}) {
    this.graph = options.acyclic ? new PartialOrder<TSpace>() : new Graph<TSpace>();
  }

  get spaces(): TSpace[] {
    return Array.from(this.graph.nodes);
  }

  /** Connections as [from, to] name pairs */
  get connections(): Array<[string, string]> {
    return this.graph.edges.map(([from, to]): [string, string] => [from.name, to.name]);
  }

  /** Register a space. A space whose name is already taken is ignored. */
  addSpace(space: TSpace): void {
    if (this.byName.has(space.name)) return;
    this.byName.set(space.name, space);
    this.graph.addNode(space);
  }

  hasSpace(name: string): boolean {
    return this.byName.has(name);
  }

  /** @throws {SpaceNotFoundError} */
  getSpace(name: string): TSpace {
    const space = this.byName.get(name);
    if (!space) {
      throw new SpaceNotFoundError(name, Array.from(this.byName.keys()));
    }
    return space;
  }

  /**
   * @throws {SpaceNotFoundError} if either name is unknown
   * @throws {CycleError} on an acyclic registry when the connection loops back
   */
  connectSpaces(fromName: string, toName: string): void {
    const from = this.getSpace(fromName);
    const to = this.getSpace(toName);
    this.graph.addEdge(from, to);
  }

  isConnected(fromName: string, toName: string): boolean {
    return this.graph.hasEdge(this.getSpace(fromName), this.getSpace(toName));
  }

  /** Spaces one connection away from `name` */
  neighbours(name: string): TSpace[] {
    return this.graph.successors(this.getSpace(name));
  }
}
