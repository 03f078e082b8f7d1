/**
 * @boardkit/core
 *
 * Generic structures for board-game engines: a directed graph and a partial
 * order for board connectivity, a double-ended queue, and the card decks
 * built on it, plus boardgame.io plugins that run them over game state.
 */

export * from './graph';
export * from './deque';
export * from './deck';
export * from './board';
export * from './plugins';

export {
  DEBUG_ENV_VAR,
  getConfig,
  setConfig,
  resetConfig,
  reloadConfig,
  parseFlag,
  type CoreConfig,
} from './config';

export { debugLog, debugEnabled } from './debug';
