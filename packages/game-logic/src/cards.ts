import { countInkCells, parseGrid } from './card.js';
import type { Card } from './types.js';

/**
 * Starter deck used for every new match.
 * A card's priority is its number of inked cells, so smaller patterns
 * take contested cells when two placements overlap.
 */

// Helper to create card entries concisely
function c(name: string, special: number, rows: string[]): Card {
  const grid = parseGrid(rows);
  return { name, priority: countInkCells(grid), special, grid };
}

export const STARTER_DECK: readonly Card[] = [
  c('Dot Dash', 1, [
    '........',
    '........',
    '........',
    '...S....',
    '...##...',
    '........',
    '........',
    '........',
  ]),
  c('Straight Line', 2, [
    '........',
    '...S....',
    '...#....',
    '...#....',
    '...#....',
    '...#....',
    '........',
    '........',
  ]),
  c('Hook', 2, [
    '........',
    '........',
    '...#....',
    '..S#....',
    '...##...',
    '........',
    '........',
    '........',
  ]),
  c('Zigzag', 3, [
    '........',
    '........',
    '..##....',
    '...#S...',
    '....##..',
    '........',
    '........',
    '........',
  ]),
  c('Tee', 3, [
    '........',
    '........',
    '..###...',
    '...S....',
    '...#....',
    '...#....',
    '........',
    '........',
  ]),
  c('Crescent', 3, [
    '........',
    '........',
    '..##S...',
    '.#......',
    '.#......',
    '..###...',
    '........',
    '........',
  ]),
  c('Long Reach', 3, [
    '........',
    '........',
    '........',
    '#######.',
    '..S.....',
    '........',
    '........',
    '........',
  ]),
  c('Corner Block', 3, [
    '........',
    '........',
    '..####..',
    '..#S....',
    '..#.....',
    '........',
    '........',
    '........',
  ]),
  c('Staircase', 4, [
    '........',
    '.##.....',
    '..##....',
    '...#S...',
    '....##..',
    '.....#..',
    '........',
    '........',
  ]),
  c('Plus Sign', 4, [
    '........',
    '...#....',
    '...#....',
    '.##S##..',
    '...#....',
    '...#....',
    '........',
    '........',
  ]),
  c('Arrow', 4, [
    '........',
    '....#...',
    '...###..',
    '..#S#.#.',
    '....#...',
    '....#...',
    '........',
    '........',
  ]),
  c('Wide Fan', 5, [
    '........',
    '..###...',
    '.#####..',
    '#..S..#.',
    '........',
    '........',
    '........',
    '........',
  ]),
  c('Fork', 4, [
    '........',
    '.#.#.#..',
    '.#.#.#..',
    '.#S###..',
    '...#....',
    '...#....',
    '........',
    '........',
  ]),
  c('Ladder', 5, [
    '........',
    '.#..#...',
    '.####...',
    '.#..#...',
    '.#S##...',
    '.#..#...',
    '........',
    '........',
  ]),
  c('Bloom', 5, [
    '........',
    '...#....',
    '..###...',
    '.#.#.#..',
    '.##S##..',
    '..###...',
    '........',
    '........',
  ]),
];
