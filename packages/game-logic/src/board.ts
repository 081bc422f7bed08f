import { BoardError, PositionError } from './errors.js';
import type { BoardPosition, BoardSpace, PlayerNum } from './types.js';

export const MAX_BOARD_WIDTH = 26;
export const MAX_BOARD_HEIGHT = 26;

// NW, N, NE, W, E, SW, S, SE
const NEIGHBOUR_OFFSETS: readonly (readonly [number, number])[] = [
  [-1, -1], [0, -1], [1, -1],
  [-1, 0], [1, 0],
  [-1, 1], [0, 1], [1, 1],
];

export function isInk(space: BoardSpace, player: PlayerNum): boolean {
  return (space.type === 'ink' || space.type === 'special') && space.owner === player;
}

export function isSpecial(space: BoardSpace, player: PlayerNum): boolean {
  return space.type === 'special' && space.owner === player;
}

export function isInactiveSpecial(space: BoardSpace, player: PlayerNum): boolean {
  return space.type === 'special' && space.owner === player && !space.activated;
}

/**
 * Rectangular grid of spaces, between 1x1 and 26x26.
 * The dimensions are fixed once constructed; only space contents change.
 */
export class Board {
  private readonly rows: BoardSpace[][];

  constructor(rows: BoardSpace[][]) {
    if (rows.length === 0) {
      throw new BoardError('NO_ROWS', 'Board with no rows given');
    }
    if (rows.length > MAX_BOARD_HEIGHT) {
      throw new BoardError('TOO_LARGE', `Board of height ${rows.length} exceeds the maximum of ${MAX_BOARD_HEIGHT}`);
    }
    const width = rows[0].length;
    if (width === 0) {
      throw new BoardError('EMPTY_ROWS', 'Board contains empty rows');
    }
    if (width > MAX_BOARD_WIDTH) {
      throw new BoardError('TOO_LARGE', `Board of width ${width} exceeds the maximum of ${MAX_BOARD_WIDTH}`);
    }
    if (rows.some(row => row.length !== width)) {
      throw new BoardError('MISMATCHED_ROW_LENGTHS', 'Not all board rows have the same length');
    }
    this.rows = rows.map(row => row.map(space => ({ ...space })));
  }

  get width(): number {
    return this.rows[0].length;
  }

  get height(): number {
    return this.rows.length;
  }

  /**
   * Lookup that never fails: anything off the board is `outOfBounds`.
   * Returns a copy; writes go through setSpace.
   */
  getSpace(x: number, y: number): Readonly<BoardSpace> {
    if (!Number.isInteger(x) || !Number.isInteger(y)) return { type: 'outOfBounds' };
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) return { type: 'outOfBounds' };
    return { ...this.rows[y][x] };
  }

  position(x: number, y: number): BoardPosition {
    if (!Number.isSafeInteger(x)) {
      throw new PositionError('UNSAFE_INTEGER', `x coordinate ${x} is not a safe integer`);
    }
    if (!Number.isSafeInteger(y)) {
      throw new PositionError('UNSAFE_INTEGER', `y coordinate ${y} is not a safe integer`);
    }
    if (x < 0 || x >= this.width) {
      throw new PositionError('OUT_OF_BOUNDS', `x coordinate ${x} exceeds board width ${this.width}`);
    }
    if (y < 0 || y >= this.height) {
      throw new PositionError('OUT_OF_BOUNDS', `y coordinate ${y} exceeds board height ${this.height}`);
    }
    return { x, y };
  }

  /**
   * Position of a card cell at (xOffset, yOffset) when the card's top-left
   * corner sits at (anchorX, anchorY). Anchors may be negative.
   */
  absolutePosition(xOffset: number, yOffset: number, anchorX: number, anchorY: number): BoardPosition {
    const x = checkedAdd('x', anchorX, xOffset);
    const y = checkedAdd('y', anchorY, yOffset);
    return this.position(x, y);
  }

  surroundingSpaces(pos: BoardPosition): Readonly<BoardSpace>[] {
    return NEIGHBOUR_OFFSETS.map(([dx, dy]) => this.getSpace(pos.x + dx, pos.y + dy));
  }

  isSurrounded(pos: BoardPosition): boolean {
    return this.surroundingSpaces(pos).every(s => s.type !== 'empty');
  }

  adjacentToInk(pos: BoardPosition, player: PlayerNum): boolean {
    return this.surroundingSpaces(pos).some(s => isInk(s, player));
  }

  adjacentToSpecial(pos: BoardPosition, player: PlayerNum): boolean {
    return this.surroundingSpaces(pos).some(s => isSpecial(s, player));
  }

  setSpace(pos: BoardPosition, space: BoardSpace): void {
    this.rows[pos.y][pos.x] = space;
  }

  setInk(spaces: readonly (readonly [BoardPosition, BoardSpace])[]): void {
    for (const [pos, space] of spaces) {
      this.setSpace(pos, space);
    }
  }

  /** Inactive special squares of `player` with no empty neighbour, row-major. */
  surroundedInactiveSpecials(player: PlayerNum): BoardPosition[] {
    const found: BoardPosition[] = [];
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        const pos = { x, y };
        if (isInactiveSpecial(this.rows[y][x], player) && this.isSurrounded(pos)) {
          found.push(pos);
        }
      }
    }
    return found;
  }

  countInkedSpaces(player: PlayerNum): number {
    let count = 0;
    for (const row of this.rows) {
      for (const space of row) {
        if (isInk(space, player)) count++;
      }
    }
    return count;
  }

  toRows(): BoardSpace[][] {
    return this.rows.map(row => row.map(space => ({ ...space })));
  }

  toJSON(): BoardSpace[][] {
    return this.toRows();
  }
}

function checkedAdd(coordinate: 'x' | 'y', base: number, offset: number): number {
  if (!Number.isSafeInteger(base)) {
    throw new PositionError('UNSAFE_INTEGER', `Base ${coordinate} coordinate ${base} is not a safe integer`);
  }
  const sum = base + offset;
  if (!Number.isSafeInteger(sum)) {
    throw new PositionError(
      'OVERFLOW',
      `Final ${coordinate} coordinate with base ${base} and offset ${offset} overflowed`,
    );
  }
  return sum;
}

const DEFAULT_BOARD_WIDTH = 9;
const DEFAULT_BOARD_HEIGHT = 26;

/** The standard 9x26 board with one inactive special square per player. */
export function createDefaultBoard(): Board {
  const rows = Array.from({ length: DEFAULT_BOARD_HEIGHT }, () =>
    Array.from({ length: DEFAULT_BOARD_WIDTH }, (): BoardSpace => ({ type: 'empty' })),
  );
  rows[3][4] = { type: 'special', owner: 'player2', activated: false };
  rows[22][4] = { type: 'special', owner: 'player1', activated: false };
  return new Board(rows);
}
