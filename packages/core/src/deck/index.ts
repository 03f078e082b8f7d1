export type { Shuffler, DeckEnd, Deck, CardDeckOptions } from './types';
export { DeckExhaustedError } from './types';
export { fisherYatesShuffle } from './shuffle';
export { CardDeck } from './card-deck';
