export type PlayerNum = 'player1' | 'player2';

export const PLAYER_NUMS: readonly PlayerNum[] = ['player1', 'player2'];

export function otherPlayer(num: PlayerNum): PlayerNum {
  return num === 'player1' ? 'player2' : 'player1';
}

export type BoardSpace =
  | { type: 'empty' }
  | { type: 'ink'; owner: PlayerNum }
  | { type: 'special'; owner: PlayerNum; activated: boolean }
  | { type: 'wall' }
  | { type: 'outOfBounds' };

export interface BoardPosition {
  readonly x: number;
  readonly y: number;
}

export type InkType = 'normal' | 'special';

export type CardCell = InkType | null;

// Always CARD_WIDTH x CARD_WIDTH, indexed [y][x]
export type Grid = CardCell[][];

export interface Card {
  readonly name: string;
  readonly priority: number;
  readonly special: number;
  readonly grid: Grid;
}

// Number of 90° counter-clockwise steps applied to a card
export type RotationSteps = 0 | 1 | 2 | 3;

export type Rotation = 0 | 90 | 180 | 270;

export type HandSlot = 0 | 1 | 2 | 3;

export type Action =
  | { type: 'pass' }
  | { type: 'place'; x: number; y: number; special: boolean; rotation: Rotation };

export interface RawInput {
  handSlot: HandSlot;
  action: Action;
}

export type Outcome = PlayerNum | 'draw';

export interface PlayerView {
  playerNum: PlayerNum;
  special: number;
  hand: number[];
  deck: {
    cards: Card[];
    available: boolean[];
  };
}
