import { CardError } from './errors.js';
import type { Card, CardCell, Grid, Rotation, RotationSteps } from './types.js';

export const CARD_WIDTH = 8;

const ROTATION_STEPS: Record<Rotation, RotationSteps> = {
  0: 0,
  90: 1,
  180: 2,
  270: 3,
};

export function rotationSteps(rotation: Rotation): RotationSteps {
  return ROTATION_STEPS[rotation];
}

export function cloneGrid(grid: Grid): Grid {
  return grid.map(row => [...row]);
}

/** Rotates an 8x8 grid 90° counter-clockwise, in place. */
export function rotateGridCcw(grid: Grid): void {
  const n = CARD_WIDTH;
  for (let i = 0; i < n / 2; i++) {
    for (let j = i; j < n - i - 1; j++) {
      const temp = grid[i][j];
      grid[i][j] = grid[j][n - 1 - i];
      grid[j][n - 1 - i] = grid[n - 1 - i][n - 1 - j];
      grid[n - 1 - i][n - 1 - j] = grid[n - 1 - j][i];
      grid[n - 1 - j][i] = temp;
    }
  }
}

/** The card's grid after `steps` counter-clockwise turns. The card is untouched. */
export function rotateCard(card: Card, steps: RotationSteps): Grid {
  const grid = cloneGrid(card.grid);
  for (let i = 0; i < steps; i++) {
    rotateGridCcw(grid);
  }
  return grid;
}

const CELL_CHARS: Record<string, CardCell> = {
  '.': null,
  '#': 'normal',
  S: 'special',
};

/**
 * Builds a grid from 8 rows of 8 characters:
 * `.` is empty, `#` is normal ink and `S` is special ink.
 */
export function parseGrid(rows: readonly string[]): Grid {
  if (rows.length !== CARD_WIDTH) {
    throw new CardError('INVALID_GRID', `Card grid must have ${CARD_WIDTH} rows, got ${rows.length}`);
  }
  return rows.map((row, y) => {
    if (row.length !== CARD_WIDTH) {
      throw new CardError('INVALID_GRID', `Card grid row ${y} must have ${CARD_WIDTH} cells, got ${row.length}`);
    }
    return Array.from(row, (ch, x) => {
      if (!Object.hasOwn(CELL_CHARS, ch)) {
        throw new CardError('INVALID_GRID', `Unknown cell '${ch}' at (${x}, ${y})`);
      }
      return CELL_CHARS[ch];
    });
  });
}

export function countInkCells(grid: Grid): number {
  return grid.reduce((sum, row) => sum + row.filter(cell => cell !== null).length, 0);
}
