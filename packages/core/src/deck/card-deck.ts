/**
 * CardDeck: the one Deck implementation shared by every kind of card.
 *
 * The deck owns a single Deque and delegates every sequence operation to it.
 * An empty-deque failure comes back out as a DeckExhaustedError naming the
 * deck, which game code can treat as a "deck ran out" event.
 */

import { Deque, EmptyDequeError } from '../deque';
import { debugLog } from '../debug';
import { fisherYatesShuffle } from './shuffle';
import {
  DeckExhaustedError,
  type CardDeckOptions,
  type Deck,
  type DeckEnd,
  type Shuffler,
} from './types';

export class CardDeck<TCard> implements Deck<TCard> {
  readonly name: string;
  private cards: Deque<TCard>;
  private readonly shuffler: Shuffler;

  constructor(cards: Iterable<TCard> = [], options: CardDeckOptions = {}) {
    this.name = options.name ?? 'deck';
    this.shuffler = options.shuffler ?? fisherYatesShuffle;
    this.cards = new Deque(cards);
  }

  get length(): number {
    return this.cards.length;
  }

  /**
   * Copies the cards out, permutes them, and rebuilds the deque from the
   * permuted order. A per-call shuffler overrides the deck's own.
   */
  shuffle(shuffler: Shuffler = this.shuffler): void {
    const permuted = shuffler(this.cards.toArray());
    this.cards = new Deque(permuted);
    debugLog('CardDeck', `${this.name} shuffled`, this.cards.length, 'cards');
  }

  drawFront(): TCard {
    return this.draw('front');
  }

  drawRear(): TCard {
    return this.draw('rear');
  }

  addCardFront(card: TCard): void {
    this.cards.enqueueFront(card);
  }

  addCardRear(card: TCard): void {
    this.cards.enqueueRear(card);
  }

  [Symbol.iterator](): Iterator<TCard> {
    return this.cards[Symbol.iterator]();
  }

  toString(): string {
    return `CardDeck(name=${this.name}, size=${this.cards.length})`;
  }

  private draw(end: DeckEnd): TCard {
    try {
      return end === 'front' ? this.cards.dequeueFront() : this.cards.dequeueRear();
    } catch (error) {
      if (error instanceof EmptyDequeError) {
        debugLog('CardDeck', `${this.name} exhausted drawing from the ${end}`);
        throw new DeckExhaustedError(this.name, end);
      }
      throw error;
    }
  }
}
