import { Board, createDefaultBoard } from './board.js';
import { STARTER_DECK } from './cards.js';
import type { Placement, ValidInput } from './input.js';
import { Player } from './player.js';
import { CryptoDrawRng, type DrawRng } from './rng.js';
import type { BoardPosition, BoardSpace, Card, HandSlot, InkType, Outcome, PlayerNum } from './types.js';

export const DEFAULT_TURNS = 12;

export interface CreateGameOptions {
  rng?: DrawRng;
  board?: Board;
  /** Deck for both players unless a per-player deck is given. */
  cards?: readonly Card[];
  player1Cards?: readonly Card[];
  player2Cards?: readonly Card[];
  turns?: number;
}

type Overlap = [BoardPosition, InkType, InkType];

/**
 * Maps each contested cell to its final space.
 * `normalCollision` settles normal/normal cells and `specialCollision`
 * settles special/special cells; a special pattern always beats normal ink.
 */
export function resolveOverlap(
  overlap: readonly Overlap[],
  normalCollision: BoardSpace,
  specialCollision: BoardSpace,
): [BoardPosition, BoardSpace][] {
  return overlap.map(([pos, ink1, ink2]): [BoardPosition, BoardSpace] => {
    if (ink1 === 'normal' && ink2 === 'normal') return [pos, normalCollision];
    if (ink1 === 'special' && ink2 === 'normal') {
      return [pos, { type: 'special', owner: 'player1', activated: false }];
    }
    if (ink1 === 'normal' && ink2 === 'special') {
      return [pos, { type: 'special', owner: 'player2', activated: false }];
    }
    return [pos, specialCollision];
  });
}

// The lower-priority card takes a contested cell; equal priorities leave a wall.
function collisionSpaces(priority1: number, priority2: number): [BoardSpace, BoardSpace] {
  if (priority1 > priority2) {
    return [
      { type: 'ink', owner: 'player2' },
      { type: 'special', owner: 'player2', activated: false },
    ];
  }
  if (priority1 < priority2) {
    return [
      { type: 'ink', owner: 'player1' },
      { type: 'special', owner: 'player1', activated: false },
    ];
  }
  return [{ type: 'wall' }, { type: 'wall' }];
}

function findOverlap(placement1: Placement, placement2: Placement): Overlap[] {
  const overlap: Overlap[] = [];
  for (const [pos1, ink1] of placement1.inkSpaces) {
    const match = placement2.inkSpaces.find(([pos2]) => pos1.x === pos2.x && pos1.y === pos2.y);
    if (match) overlap.push([pos1, ink1, match[1]]);
  }
  return overlap;
}

export class GameState {
  private readonly players: Record<PlayerNum, Player>;
  private _turnsLeft: number;

  constructor(
    private readonly _board: Board,
    players: [Player, Player],
    turnsLeft: number,
    private readonly rng: DrawRng,
  ) {
    this.players = { player1: players[0], player2: players[1] };
    this._turnsLeft = turnsLeft;
  }

  /** A fresh match: default board, both players dealt from the starter deck. */
  static create(options: CreateGameOptions = {}): GameState {
    const rng = options.rng ?? new CryptoDrawRng();
    const board = options.board ?? createDefaultBoard();
    const cards = options.cards ?? STARTER_DECK;
    const player1 = Player.deal(options.player1Cards ?? cards, 'player1', rng);
    const player2 = Player.deal(options.player2Cards ?? cards, 'player2', rng);
    return new GameState(board, [player1, player2], options.turns ?? DEFAULT_TURNS, rng);
  }

  get board(): Board {
    return this._board;
  }

  get turnsLeft(): number {
    return this._turnsLeft;
  }

  player(num: PlayerNum): Player {
    return this.players[num];
  }

  redrawHand(num: PlayerNum): void {
    this.players[num].redrawHand(this.rng);
  }

  checkWinner(): Outcome {
    const p1 = this._board.countInkedSpaces('player1');
    const p2 = this._board.countInkedSpaces('player2');
    if (p1 > p2) return 'player1';
    if (p2 > p1) return 'player2';
    return 'draw';
  }

  /** Resolves one turn once both players' validated inputs are known. */
  update(input1: ValidInput, input2: ValidInput): void {
    const move1 = input1.input;
    const move2 = input2.input;

    if (move1.type === 'pass' && move2.type === 'pass') {
      this.players.player1.addSpecial(1);
      this.players.player2.addSpecial(1);
    } else if (move1.type === 'place' && move2.type === 'pass') {
      this.players.player2.addSpecial(1);
      this.place(input1.handSlot, move1.placement, 'player1');
    } else if (move1.type === 'pass' && move2.type === 'place') {
      this.players.player1.addSpecial(1);
      this.place(input2.handSlot, move2.placement, 'player2');
    } else if (move1.type === 'place' && move2.type === 'place') {
      this.placeBoth(input1.handSlot, input2.handSlot, move1.placement, move2.placement);
    }

    this.refillAndActivate('player1', input1.handSlot);
    this.refillAndActivate('player2', input2.handSlot);

    if (this._turnsLeft > 0) {
      this._turnsLeft -= 1;
    }
  }

  private spend(num: PlayerNum, slot: HandSlot, placement: Placement): void {
    if (placement.specialActivated) {
      const player = this.players[num];
      player.spendSpecial(player.getCard(slot).special);
    }
  }

  private place(slot: HandSlot, placement: Placement, num: PlayerNum): void {
    this.spend(num, slot, placement);
    this._board.setInk(placement.toBoardSpaces(num));
  }

  private placeBoth(slot1: HandSlot, slot2: HandSlot, placement1: Placement, placement2: Placement): void {
    const priority1 = this.players.player1.getCard(slot1).priority;
    const priority2 = this.players.player2.getCard(slot2).priority;
    this.spend('player1', slot1, placement1);
    this.spend('player2', slot2, placement2);

    // Contested cells are written last so they overwrite both placements
    this._board.setInk(placement1.toBoardSpaces('player1'));
    this._board.setInk(placement2.toBoardSpaces('player2'));
    const overlap = findOverlap(placement1, placement2);
    if (overlap.length > 0) {
      const [normalCollision, specialCollision] = collisionSpaces(priority1, priority2);
      this._board.setInk(resolveOverlap(overlap, normalCollision, specialCollision));
    }
  }

  private refillAndActivate(num: PlayerNum, slot: HandSlot): void {
    const player = this.players[num];
    player.replaceCard(slot, this.rng);
    const surrounded = this._board.surroundedInactiveSpecials(num);
    for (const pos of surrounded) {
      this._board.setSpace(pos, { type: 'special', owner: num, activated: true });
    }
    player.addSpecial(surrounded.length);
  }
}
