import { Deck, type Hand } from './deck.js';
import { InvariantError } from './errors.js';
import type { DrawRng } from './rng.js';
import type { Card, HandSlot, PlayerNum, PlayerView } from './types.js';

export class Player {
  private _hand: Hand;
  private _deck: Deck;
  private _special: number;

  constructor(
    hand: Hand,
    deck: Deck,
    readonly playerNum: PlayerNum,
    special = 0,
  ) {
    this._hand = hand;
    this._deck = deck;
    this._special = special;
  }

  static deal(cards: readonly Card[], playerNum: PlayerNum, rng: DrawRng): Player {
    const { deck, hand } = Deck.dealHand(cards, rng);
    return new Player(hand, deck, playerNum);
  }

  get hand(): Hand {
    return this._hand;
  }

  get deck(): Deck {
    return this._deck;
  }

  get special(): number {
    return this._special;
  }

  getCard(slot: HandSlot): Card {
    return this._deck.card(this._hand.get(slot));
  }

  addSpecial(amount: number): void {
    this._special += amount;
  }

  /** Callers validate affordability first; going below zero is a bug. */
  spendSpecial(amount: number): void {
    if (amount > this._special) {
      throw new InvariantError(
        `${this.playerNum} cannot spend ${amount} special with only ${this._special} available`,
      );
    }
    this._special -= amount;
  }

  /** Discards the whole hand and deals a new one from a full deck. */
  redrawHand(rng: DrawRng): void {
    const { deck, hand } = Deck.dealHand(this._deck.cardList, rng);
    this._deck = deck;
    this._hand = hand;
  }

  // The slot keeps its old card once the deck is exhausted; the match is over by then.
  replaceCard(slot: HandSlot, rng: DrawRng): void {
    const deckIndex = this._deck.drawCard(rng);
    if (deckIndex !== undefined) {
      this._hand.set(slot, deckIndex);
    }
  }

  toJSON(): PlayerView {
    return {
      playerNum: this.playerNum,
      special: this._special,
      hand: this._hand.toArray(),
      deck: this._deck.toJSON(),
    };
  }
}
