import type { Board } from './board.js';
import { rotateCard, rotationSteps } from './card.js';
import { InputError, PositionError } from './errors.js';
import type { Player } from './player.js';
import type { BoardPosition, BoardSpace, HandSlot, InkType, PlayerNum, RawInput } from './types.js';

export type InkSpaces = readonly (readonly [BoardPosition, InkType])[];

function toBoardSpace(ink: InkType, owner: PlayerNum): BoardSpace {
  return ink === 'normal'
    ? { type: 'ink', owner }
    : { type: 'special', owner, activated: false };
}

// Not exported: nothing outside this module can construct a Placement.
const VALIDATED: unique symbol = Symbol('validated');

/**
 * A card placement that has passed every rule check against the board and
 * player it was validated with. Only `validateInput` creates these.
 */
export class Placement {
  constructor(
    _token: typeof VALIDATED,
    readonly inkSpaces: InkSpaces,
    readonly specialActivated: boolean,
  ) {}

  toBoardSpaces(owner: PlayerNum): [BoardPosition, BoardSpace][] {
    return this.inkSpaces.map(([pos, ink]): [BoardPosition, BoardSpace] => [pos, toBoardSpace(ink, owner)]);
  }
}

export type Input = { type: 'pass' } | { type: 'place'; placement: Placement };

export interface ValidInput {
  readonly handSlot: HandSlot;
  readonly input: Input;
}

/**
 * Checks a parsed move against the board and the moving player.
 * Throws InputError for any rule violation; never mutates its arguments.
 */
export function validateInput(raw: RawInput, board: Board, player: Player): ValidInput {
  const { handSlot, action } = raw;
  if (action.type === 'pass') {
    return { handSlot, input: { type: 'pass' } };
  }

  const card = player.getCard(handSlot);
  const grid = rotateCard(card, rotationSteps(action.rotation));

  const inkSpaces: [BoardPosition, InkType][] = [];
  try {
    grid.forEach((row, y) => {
      row.forEach((cell, x) => {
        if (cell !== null) {
          inkSpaces.push([board.absolutePosition(x, y, action.x, action.y), cell]);
        }
      });
    });
  } catch (err) {
    if (err instanceof PositionError) {
      throw new InputError('INVALID_POSITION', `Invalid placement position: ${err.message}`);
    }
    throw err;
  }

  const owner = player.playerNum;
  if (action.special) {
    if (player.special < card.special) {
      throw new InputError(
        'INSUFFICIENT_SPECIAL',
        `Insufficient special. Current special: ${player.special}. Required: ${card.special}`,
      );
    }
    if (inkSpaces.some(([pos]) => isSpecialCollision(board.getSpace(pos.x, pos.y)))) {
      throw new InputError('SPECIAL_COLLISION', 'Special placement is overlapping walls or special spaces');
    }
    if (!inkSpaces.some(([pos]) => board.adjacentToSpecial(pos, owner))) {
      throw new InputError('SPECIAL_NOT_ADJACENT', 'Special placement not adjacent to a special square');
    }
  } else {
    if (inkSpaces.some(([pos]) => board.getSpace(pos.x, pos.y).type !== 'empty')) {
      throw new InputError('INK_COLLISION', 'Ink placement not over empty spaces');
    }
    if (!inkSpaces.some(([pos]) => board.adjacentToInk(pos, owner))) {
      throw new InputError('INK_NOT_ADJACENT', "Ink placement not adjacent to player's ink");
    }
  }

  return {
    handSlot,
    input: { type: 'place', placement: new Placement(VALIDATED, inkSpaces, action.special) },
  };
}

function isSpecialCollision(space: BoardSpace): boolean {
  return space.type === 'special' || space.type === 'wall' || space.type === 'outOfBounds';
}
