import { describe, it, expect, beforeEach } from 'vitest';
import { InvariantError } from '../src/errors.js';
import { Player } from '../src/player.js';
import { FirstPickRng, makeCard, makeDeck } from './helpers.js';

describe('Player', () => {
  const cards = makeDeck([makeCard('Bar', ['##'], { special: 3 })]);
  let rng: FirstPickRng;
  let player: Player;

  beforeEach(() => {
    rng = new FirstPickRng();
    player = Player.deal(cards, 'player1', rng);
  });

  it('should start with a dealt hand and an empty meter', () => {
    expect(player.playerNum).toBe('player1');
    expect(player.special).toBe(0);
    expect(player.hand.toArray()).toEqual([0, 1, 2, 3]);
    expect(player.getCard(0).name).toBe('Bar');
  });

  it('should spend only what it has', () => {
    player.addSpecial(3);
    player.spendSpecial(2);
    expect(player.special).toBe(1);
    expect(() => player.spendSpecial(2)).toThrow(InvariantError);
    expect(player.special).toBe(1);
  });

  it('should refill a played slot from the deck', () => {
    player.replaceCard(2, rng);
    expect(player.hand.toArray()).toEqual([0, 1, 4, 3]);
    expect(player.deck.remaining).toBe(10);
  });

  it('should keep the slot once the deck is exhausted', () => {
    for (let i = 0; i < 11; i++) player.replaceCard(0, rng);
    expect(player.hand.get(0)).toBe(14);
    player.replaceCard(0, rng);
    expect(player.hand.get(0)).toBe(14);
  });

  it('should redraw from a full deck', () => {
    player.replaceCard(0, rng);
    player.redrawHand(rng);
    expect(player.hand.toArray()).toEqual([0, 1, 2, 3]);
    expect(player.deck.remaining).toBe(11);
  });

  it('should serialize its view', () => {
    player.addSpecial(2);
    const view = player.toJSON();
    expect(view.playerNum).toBe('player1');
    expect(view.special).toBe(2);
    expect(view.hand).toEqual([0, 1, 2, 3]);
    expect(view.deck.cards).toHaveLength(15);
    expect(view.deck.available.filter(Boolean)).toHaveLength(11);
  });
});
