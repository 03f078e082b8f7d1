/**
 * Board Plugin for boardgame.io
 *
 * Keeps the board's space connections in `G.board` as plain arrays and checks
 * every new connection against a PartialOrder rebuilt from them, so routes
 * never loop back on themselves.
 */

import type { Ctx } from 'boardgame.io';
import { CycleError, InvariantViolationError, PartialOrder } from '../graph';
import { debugLog } from '../debug';

// =============================================================================
// Types
// =============================================================================

export interface BoardState {
  spaces: string[];
  /** [from, to] space names */
  connections: Array<[string, string]>;
}

export interface BoardPluginGameState {
  board: BoardState;
}

export interface ConnectResult {
  success: boolean;
  error?: string;
}

export interface BoardPluginApi {
  /** Idempotent */
  addSpace: (name: string) => void;
  /** Both spaces must already be added */
  connect: (from: string, to: string) => ConnectResult;
  neighbours: (space: string) => string[];
  /** Whether `to` is reachable from `from` through one or more connections */
  canReach: (from: string, to: string) => boolean;
  /** Every space, ordered so each connection points forward */
  order: () => string[];
}

export interface CtxWithBoard extends Ctx {
  board: BoardPluginApi;
}

export function createBoardState(): BoardState {
  return { spaces: [], connections: [] };
}

/**
 * Rebuild the partial order described by a board state.
 *
 * @throws {InvariantViolationError} if the stored connections already loop
 */
export function buildPartialOrder(board: BoardState): PartialOrder<string> {
  const order = new PartialOrder<string>();
  for (const space of board.spaces) {
    order.addNode(space);
  }
  for (const [from, to] of board.connections) {
    try {
      order.addEdge(from, to);
    } catch (error) {
      if (error instanceof CycleError) {
        throw new InvariantViolationError(from);
      }
      throw error;
    }
  }
  return order;
}

// =============================================================================
// Plugin Implementation
// =============================================================================

export const BoardPlugin = {
  name: 'board',

  api: ({ G }: { G: BoardPluginGameState; ctx: Ctx }): BoardPluginApi => {
    const order = buildPartialOrder(G.board);
    // Connections may name spaces that were never added; only these count
    const known = new Set(G.board.spaces);

    return {
      addSpace: (name) => {
        if (known.has(name)) return;
        known.add(name);
        order.addNode(name);
        G.board.spaces.push(name);
      },

      connect: (from, to) => {
        for (const space of [from, to]) {
          if (!known.has(space)) {
            return { success: false, error: `Space not found: ${space}` };
          }
        }
        if (order.hasEdge(from, to)) {
          return { success: true };
        }

        try {
          order.addEdge(from, to);
        } catch (error) {
          if (error instanceof CycleError) {
            debugLog('BoardPlugin', `refused connection ${from} -> ${to}`);
            return { success: false, error: `Connecting ${from} to ${to} would create a loop` };
          }
          throw error;
        }

        G.board.connections.push([from, to]);
        return { success: true };
      },

      neighbours: (space) => order.successors(space),

      canReach: (from, to) => order.precedes(from, to),

      order: () => order.linearize(),
    };
  },
};

export default BoardPlugin;
