import { Board } from '../src/board.js';
import { countInkCells, parseGrid } from '../src/card.js';
import type { DrawRng, Four } from '../src/rng.js';
import type { BoardSpace, Card } from '../src/types.js';

/** Always picks the first item, so dealt hands are [0, 1, 2, 3] and draws go 4, 5, 6... */
export class FirstPickRng implements DrawRng {
  draw<T>(items: readonly T[]): T | undefined {
    return items[0];
  }

  drawHand<T>(items: readonly T[]): Four<T> {
    if (items.length < 4) {
      throw new RangeError(`Cannot draw a hand of 4 from ${items.length} items`);
    }
    return [items[0], items[1], items[2], items[3]];
  }
}

const SPACES = new Map<string, BoardSpace>([
  ['.', { type: 'empty' }],
  ['W', { type: 'wall' }],
  ['1', { type: 'ink', owner: 'player1' }],
  ['2', { type: 'ink', owner: 'player2' }],
  ['A', { type: 'special', owner: 'player1', activated: false }],
  ['B', { type: 'special', owner: 'player2', activated: false }],
  ['a', { type: 'special', owner: 'player1', activated: true }],
  ['b', { type: 'special', owner: 'player2', activated: true }],
]);

/**
 * Board from one string per row:
 * `.` empty, `W` wall, `1`/`2` ink, `A`/`B` inactive special, `a`/`b` active special.
 */
export function boardFromRows(rows: string[]): Board {
  return new Board(
    rows.map(row =>
      Array.from(row, ch => {
        const space = SPACES.get(ch);
        if (!space) throw new Error(`Unknown board character '${ch}'`);
        return { ...space };
      }),
    ),
  );
}

/** Pads a short pattern (top-left aligned) to a full 8x8 card. */
export function makeCard(name: string, pattern: string[], options: { special?: number; priority?: number } = {}): Card {
  const rows = Array.from({ length: 8 }, (_, y) => (pattern[y] ?? '').padEnd(8, '.'));
  const grid = parseGrid(rows);
  return {
    name,
    priority: options.priority ?? countInkCells(grid),
    special: options.special ?? 1,
    grid,
  };
}

/** A full 15-card deck: the given cards first, then single-cell fillers. */
export function makeDeck(cards: Card[]): Card[] {
  const deck = [...cards];
  while (deck.length < 15) {
    deck.push(makeCard(`Filler ${deck.length}`, ['#']));
  }
  return deck;
}
