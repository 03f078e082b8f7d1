/**
 * Deck Types
 *
 * The contract every deck of cards in a game exposes. Card types are opaque
 * to the deck; games extend them however they like.
 */

// =============================================================================
// Shuffling
// =============================================================================

/**
 * Returns a uniformly random permutation of `items` as a new array.
 * boardgame.io's `random.Shuffle` has this shape.
 */
export type Shuffler = <T>(items: T[]) => T[];

// =============================================================================
// Deck
// =============================================================================

export type DeckEnd = 'front' | 'rear';

export interface Deck<TCard> extends Iterable<TCard> {
  /** Number of cards left */
  readonly length: number;

  /** Reorder the deck in place. */
  shuffle(shuffler?: Shuffler): void;

  /** @throws {DeckExhaustedError} when the deck is empty */
  drawFront(): TCard;

  /** @throws {DeckExhaustedError} when the deck is empty */
  drawRear(): TCard;

  addCardFront(card: TCard): void;

  addCardRear(card: TCard): void;
}

export interface CardDeckOptions {
  /** Name used in errors and log lines */
  name?: string;
  /** Default shuffler for this deck (Fisher-Yates over Math.random otherwise) */
  shuffler?: Shuffler;
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Thrown when a card is drawn from an empty deck.
 */
export class DeckExhaustedError extends Error {
  constructor(
    public readonly deckName: string,
    public readonly end: DeckEnd
  ) {
    super(`Cannot draw from the ${end} of ${deckName}: the deck is empty`);
    this.name = 'DeckExhaustedError';
  }
}
