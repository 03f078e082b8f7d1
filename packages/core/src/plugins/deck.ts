/**
 * Deck Plugin for boardgame.io
 *
 * Runs deck operations over the card arrays stored in `G.zones`:
 * - drawFront / drawRear: take the top or bottom card
 * - addCardFront / addCardRear: put a card on top or at the bottom
 * - shuffle: randomize a zone, optionally with boardgame.io's `random.Shuffle`
 * - count: cards in a zone
 *
 * Each operation loads the zone into a CardDeck, runs there, and writes the
 * resulting order back, so `G` stays plain serializable arrays.
 */

import type { Ctx } from 'boardgame.io';
import { CardDeck, DeckExhaustedError, type Shuffler } from '../deck';
import { debugLog } from '../debug';

// =============================================================================
// Types
// =============================================================================

/**
 * Zone identifier. "zoneName" for shared zones, "zoneName:playerId" for
 * player zones.
 */
export type ZoneId = string;

export interface ZoneRef {
  zone: string;
  /** Undefined for shared zones */
  playerId?: string;
}

/**
 * Game state expected by the deck plugin: zone name, then 'shared' or a
 * player ID, then the cards in order (index 0 is the top).
 */
export interface DeckPluginGameState<TCard = unknown> {
  zones: Record<string, Record<string, TCard[]>>;
}

/**
 * Result of a draw. Drawing from an empty or missing zone is not an error
 * for a move, so it is reported here instead of thrown.
 */
export interface DrawResult<TCard = unknown> {
  card: TCard | null;
  success: boolean;
  error?: string;
}

export interface DeckPluginApi<TCard = unknown> {
  drawFront: (zoneId: ZoneId) => DrawResult<TCard>;
  drawRear: (zoneId: ZoneId) => DrawResult<TCard>;
  /** Creates the zone if it does not exist */
  addCardFront: (zoneId: ZoneId, card: TCard) => void;
  /** Creates the zone if it does not exist */
  addCardRear: (zoneId: ZoneId, card: TCard) => void;
  /** No-op for a missing zone */
  shuffle: (zoneId: ZoneId, shuffler?: Shuffler) => void;
  count: (zoneId: ZoneId) => number;
}

export interface DeckPluginData {
  /** Tracks number of shuffles for debugging/replay */
  shuffleCount: number;
}

export interface CtxWithDeck extends Ctx {
  deck: DeckPluginApi;
}

interface DeckPluginApiInternal<TCard = unknown> extends DeckPluginApi<TCard> {
  _pendingShuffles: number;
}

// =============================================================================
// Zone Helpers
// =============================================================================

export function parseZoneId(zoneId: ZoneId): ZoneRef {
  const colonIndex = zoneId.indexOf(':');
  if (colonIndex === -1) return { zone: zoneId };
  return {
    zone: zoneId.substring(0, colonIndex),
    playerId: zoneId.substring(colonIndex + 1),
  };
}

export function buildZoneId(zone: string, playerId?: string): ZoneId {
  return playerId === undefined ? zone : `${zone}:${playerId}`;
}

export function getZoneCards<TCard>(
  G: DeckPluginGameState<TCard>,
  zoneId: ZoneId
): TCard[] | undefined {
  const { zone, playerId } = parseZoneId(zoneId);
  return G.zones[zone]?.[playerId ?? 'shared'];
}

/**
 * Replace the cards of a zone, creating it if needed.
 * Mutates G in place (boardgame.io wraps moves in Immer).
 */
export function setZoneCards<TCard>(
  G: DeckPluginGameState<TCard>,
  zoneId: ZoneId,
  cards: TCard[]
): void {
  const { zone, playerId } = parseZoneId(zoneId);
  if (!G.zones[zone]) {
    G.zones[zone] = {};
  }
  G.zones[zone][playerId ?? 'shared'] = cards;
}

/**
 * Load a zone into a CardDeck, run `operation`, and store the deck's order back.
 * The zone is written back even when `operation` throws.
 */
export function withZoneDeck<TCard, TResult>(
  G: DeckPluginGameState<TCard>,
  zoneId: ZoneId,
  operation: (deck: CardDeck<TCard>) => TResult
): TResult {
  const deck = new CardDeck(getZoneCards(G, zoneId) ?? [], { name: zoneId });
  try {
    return operation(deck);
  } finally {
    setZoneCards(G, zoneId, Array.from(deck));
  }
}

function drawFrom<TCard>(
  G: DeckPluginGameState<TCard>,
  zoneId: ZoneId,
  draw: (deck: CardDeck<TCard>) => TCard
): DrawResult<TCard> {
  if (!getZoneCards(G, zoneId)) {
    return { card: null, success: false, error: `Zone not found: ${zoneId}` };
  }
  try {
    return { card: withZoneDeck(G, zoneId, draw), success: true };
  } catch (error) {
    if (error instanceof DeckExhaustedError) {
      debugLog('DeckPlugin', error.message);
      return { card: null, success: false, error: error.message };
    }
    throw error;
  }
}

// =============================================================================
// Plugin Implementation
// =============================================================================

/**
 * @example
 * ```typescript
 * const game: Game = {
 *   plugins: [DeckPlugin],
 *   moves: {
 *     shuffleDeck: ({ ctx, random }) => {
 *       (ctx as CtxWithDeck).deck.shuffle('deck:' + ctx.currentPlayer, random.Shuffle);
 *     },
 *   },
 * };
 * ```
 */
export const DeckPlugin = {
  name: 'deck',

  setup: (): DeckPluginData => ({
    shuffleCount: 0,
  }),

  api: <TCard = unknown>({
    G,
  }: {
    G: DeckPluginGameState<TCard>;
    ctx: Ctx;
    data: DeckPluginData;
  }): DeckPluginApiInternal<TCard> => {
    const api: DeckPluginApiInternal<TCard> = {
      _pendingShuffles: 0,

      drawFront: (zoneId) => drawFrom(G, zoneId, (deck) => deck.drawFront()),

      drawRear: (zoneId) => drawFrom(G, zoneId, (deck) => deck.drawRear()),

      addCardFront: (zoneId, card) => {
        withZoneDeck(G, zoneId, (deck) => deck.addCardFront(card));
      },

      addCardRear: (zoneId, card) => {
        withZoneDeck(G, zoneId, (deck) => deck.addCardRear(card));
      },

      shuffle: (zoneId, shuffler) => {
        if (!getZoneCards(G, zoneId)) return;
        withZoneDeck(G, zoneId, (deck) => deck.shuffle(shuffler));
        api._pendingShuffles++;
      },

      count: (zoneId) => getZoneCards(G, zoneId)?.length ?? 0,
    };

    return api;
  },

  flush: ({
    data,
    api,
  }: {
    G: DeckPluginGameState;
    ctx: Ctx;
    data: DeckPluginData;
    api: { _pendingShuffles?: number };
  }): DeckPluginData => {
    const pendingShuffles = api._pendingShuffles ?? 0;
    return {
      ...data,
      shuffleCount: data.shuffleCount + pendingShuffles,
    };
  },
};

export default DeckPlugin;
