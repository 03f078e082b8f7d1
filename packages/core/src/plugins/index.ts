/**
 * boardgame.io Plugins
 */

export {
  DeckPlugin,
  type ZoneId,
  type ZoneRef,
  type DeckPluginGameState,
  type DrawResult,
  type DeckPluginApi,
  type DeckPluginData,
  type CtxWithDeck,
  parseZoneId,
  buildZoneId,
  getZoneCards,
  setZoneCards,
  withZoneDeck,
} from './deck';

export {
  BoardPlugin,
  type BoardState,
  type BoardPluginGameState,
  type ConnectResult,
  type BoardPluginApi,
  type CtxWithBoard,
  createBoardState,
  buildPartialOrder,
} from './board';
