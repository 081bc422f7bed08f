import { DeckError, HandError } from './errors.js';
import type { DrawRng, Four } from './rng.js';
import type { Card, HandSlot } from './types.js';

export const DECK_SIZE = 15;
export const HAND_SIZE = 4;

function isDeckIndex(index: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < DECK_SIZE;
}

/** Four distinct references into a player's deck. */
export class Hand {
  private readonly indices: Four<number>;

  constructor(indices: Four<number>) {
    for (const index of indices) {
      if (!isDeckIndex(index)) {
        throw new HandError('INVALID_DECK_INDEX', `Deck index ${index} is outside 0..${DECK_SIZE - 1}`);
      }
    }
    if (new Set(indices).size !== HAND_SIZE) {
      throw new HandError(
        'DUPLICATE_CARDS',
        `Failed to create a new Hand since duplicate Deck indices were given. Given indices: [${indices.join(', ')}]`,
      );
    }
    this.indices = [...indices];
  }

  get(slot: HandSlot): number {
    return this.indices[slot];
  }

  set(slot: HandSlot, deckIndex: number): void {
    if (!isDeckIndex(deckIndex)) {
      throw new HandError('INVALID_DECK_INDEX', `Deck index ${deckIndex} is outside 0..${DECK_SIZE - 1}`);
    }
    this.indices[slot] = deckIndex;
  }

  toArray(): number[] {
    return [...this.indices];
  }
}

/**
 * The 15 cards a player brings to a match and which of them can still be drawn.
 * Availability only changes by dealing a hand or drawing a card.
 */
export class Deck {
  private readonly available: boolean[];

  private constructor(private readonly cards: readonly Card[]) {
    this.available = cards.map(() => true);
  }

  /** Deals four distinct cards and marks them unavailable. */
  static dealHand(cards: readonly Card[], rng: DrawRng): { deck: Deck; hand: Hand } {
    if (cards.length !== DECK_SIZE) {
      throw new DeckError('INVALID_DECK_SIZE', `A deck needs exactly ${DECK_SIZE} cards, got ${cards.length}`);
    }
    const deck = new Deck(cards);
    const hand = new Hand(rng.drawHand(cards.map((_, i) => i)));
    for (const index of hand.toArray()) {
      deck.available[index] = false;
    }
    return { deck, hand };
  }

  card(index: number): Card {
    if (!isDeckIndex(index)) {
      throw new RangeError(`Deck index ${index} is outside 0..${DECK_SIZE - 1}`);
    }
    return this.cards[index];
  }

  isAvailable(index: number): boolean {
    return this.available[index] ?? false;
  }

  get cardList(): readonly Card[] {
    return this.cards;
  }

  get remaining(): number {
    return this.available.filter(Boolean).length;
  }

  /** Draws one available card, or returns undefined once the deck is used up. */
  drawCard(rng: DrawRng): number | undefined {
    const candidates = this.available.flatMap((isAvailable, i) => (isAvailable ? [i] : []));
    const index = rng.draw(candidates);
    if (index === undefined) return undefined;
    this.available[index] = false;
    return index;
  }

  toJSON(): { cards: Card[]; available: boolean[] } {
    return { cards: [...this.cards], available: [...this.available] };
  }
}
