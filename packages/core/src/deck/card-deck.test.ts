/**
 * Tests for CardDeck
 *
 * Draws, additions, exhaustion and shuffling over the owned deque.
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { CardDeck } from './card-deck';
import { fisherYatesShuffle } from './shuffle';
import { DeckExhaustedError, type Shuffler } from './types';
import { resetConfig, setConfig } from '../config';

// =============================================================================
// Test Utilities
// =============================================================================

interface TestCard {
  id: string;
  value: number;
}

function createTestDeck(size: number): TestCard[] {
  return Array.from({ length: size }, (_, i) => ({ id: `card-${i + 1}`, value: i + 1 }));
}

function ids(cards: Iterable<TestCard>): string[] {
  return Array.from(cards, (card) => card.id);
}

const reverseShuffler: Shuffler = (items) => items.slice().reverse();

afterEach(() => {
  resetConfig();
  vi.restoreAllMocks();
});

// =============================================================================
// Draw / Add Tests
// =============================================================================

describe('CardDeck', () => {
  describe('drawing', () => {
    it('should draw from the front in deck order', () => {
      const deck = new CardDeck(createTestDeck(3));
      expect(deck.drawFront().id).toBe('card-1');
      expect(deck.drawFront().id).toBe('card-2');
      expect(deck.length).toBe(1);
    });

    it('should draw from the rear', () => {
      const deck = new CardDeck(createTestDeck(3));
      expect(deck.drawRear().id).toBe('card-3');
      expect(ids(deck)).toEqual(['card-1', 'card-2']);
    });

    it('should throw DeckExhaustedError on an empty deck', () => {
      const deck = new CardDeck<TestCard>([], { name: 'monster deck' });
      expect(() => deck.drawFront()).toThrow(DeckExhaustedError);
      expect(() => deck.drawRear()).toThrow(
        'Cannot draw from the rear of monster deck: the deck is empty'
      );
    });

    it('should carry the deck name and end on the error', () => {
      const deck = new CardDeck<TestCard>([], { name: 'event deck' });

      try {
        deck.drawFront();
        expect.unreachable('drawFront should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(DeckExhaustedError);
        const exhausted = error as DeckExhaustedError;
        expect(exhausted.deckName).toBe('event deck');
        expect(exhausted.end).toBe('front');
        expect(exhausted.name).toBe('DeckExhaustedError');
      }
    });

    it('should default the deck name', () => {
      const deck = new CardDeck<TestCard>();
      expect(deck.name).toBe('deck');
      expect(String(deck)).toBe('CardDeck(name=deck, size=0)');
    });
  });

  describe('adding', () => {
    it('should put cards on top and at the bottom', () => {
      const deck = new CardDeck(createTestDeck(2));
      deck.addCardFront({ id: 'top', value: 0 });
      deck.addCardRear({ id: 'bottom', value: 9 });

      expect(ids(deck)).toEqual(['top', 'card-1', 'card-2', 'bottom']);
      expect(deck.length).toBe(4);
    });

    it('should accept cards after being exhausted', () => {
      const deck = new CardDeck(createTestDeck(1));
      deck.drawFront();
      deck.addCardRear({ id: 'returned', value: 5 });
      expect(deck.drawFront().id).toBe('returned');
    });
  });

  // ===========================================================================
  // Shuffle Tests
  // ===========================================================================

  describe('shuffle', () => {
    it('should keep the same cards', () => {
      const cards = createTestDeck(10);
      const deck = new CardDeck(cards);
      deck.shuffle();

      expect(deck.length).toBe(10);
      expect(ids(deck).sort()).toEqual(ids(cards).sort());
    });

    it('should keep duplicate cards as duplicates', () => {
      const deck = new CardDeck(['clue', 'clue', 'doom', 'clue']);
      deck.shuffle();

      const counts = new Map<string, number>();
      for (const card of deck) counts.set(card, (counts.get(card) ?? 0) + 1);
      expect(counts.get('clue')).toBe(3);
      expect(counts.get('doom')).toBe(1);
    });

    it('should rebuild the deck in the shuffled order', () => {
      const deck = new CardDeck(createTestDeck(4), { shuffler: reverseShuffler });
      deck.shuffle();

      expect(ids(deck)).toEqual(['card-4', 'card-3', 'card-2', 'card-1']);
      expect(deck.drawFront().id).toBe('card-4');
      expect(deck.drawRear().id).toBe('card-1');
    });

    it('should prefer a shuffler passed to the call', () => {
      let deckShufflerCalls = 0;
      const deckShuffler: Shuffler = (items) => {
        deckShufflerCalls++;
        return reverseShuffler(items);
      };
      const deck = new CardDeck(createTestDeck(3), { shuffler: deckShuffler });

      deck.shuffle((items) => fisherYatesShuffle(items, () => 0));

      expect(deckShufflerCalls).toBe(0);
      expect(ids(deck)).toEqual(['card-2', 'card-3', 'card-1']);
    });

    it('should shuffle an empty deck', () => {
      const deck = new CardDeck<TestCard>();
      deck.shuffle();
      expect(deck.length).toBe(0);
    });

    it('should log shuffles when debug logging is enabled', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      setConfig({ debug: true });
      const deck = new CardDeck(createTestDeck(2), { name: 'spells' });

      deck.shuffle(reverseShuffler);

      expect(log).toHaveBeenCalledWith('[CardDeck]', 'spells shuffled', 2, 'cards');
    });
  });
});

// =============================================================================
// Fisher-Yates Tests
// =============================================================================

describe('fisherYatesShuffle', () => {
  it('should not modify original array', () => {
    const original = [1, 2, 3, 4, 5];
    const copy = [...original];
    fisherYatesShuffle(original);
    expect(original).toEqual(copy);
  });

  it('should follow the random source', () => {
    // always picking index 0 rotates the first element to the end
    expect(fisherYatesShuffle([1, 2, 3, 4], () => 0)).toEqual([2, 3, 4, 1]);
    // always picking the top index leaves the order alone
    expect(fisherYatesShuffle([1, 2, 3, 4], () => 0.999)).toEqual([1, 2, 3, 4]);
  });

  it('should actually shuffle (statistical test)', () => {
    const original = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10];
    const results = new Set<string>();

    for (let i = 0; i < 100; i++) {
      results.add(fisherYatesShuffle(original).join(','));
    }

    expect(results.size).toBeGreaterThan(50);
  });
});
