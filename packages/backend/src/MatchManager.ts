import { v4 as uuidv4 } from 'uuid';
import { InvariantError } from '@inkgrid/game-logic';
import { Match, type GameStateFactory } from './Match.js';
import { silentLogger } from './logger.js';
import { RetryingSender } from './retry.js';
import type { ClientStatus, MatchLogger, MessageSender } from './types.js';

export const LEAVE_MESSAGE = 'leave';

interface Client {
  id: string;
  userId: number;
  status: ClientStatus;
  sender?: MessageSender;
  matchId?: string;
}

interface MatchRoom {
  id: string;
  match: Match;
}

export interface MatchManagerOptions {
  createGameState: GameStateFactory;
  logger?: MatchLogger;
  /** Extra attempts for each failed send */
  sendRetries?: number;
}

/**
 * Registered clients, the matchmaking queue and the running matches.
 * All calls come from the server's event handlers, one at a time.
 */
export class MatchManager {
  private clients = new Map<string, Client>();
  private matches = new Map<string, MatchRoom>();
  private waitingId: string | undefined;
  private readonly createGameState: GameStateFactory;
  private readonly logger: MatchLogger;
  private readonly sendRetries: number;

  constructor(options: MatchManagerOptions) {
    this.createGameState = options.createGameState;
    this.logger = options.logger ?? silentLogger;
    this.sendRetries = options.sendRetries ?? 1;
  }

  register(userId: number): string {
    const id = uuidv4();
    this.clients.set(id, { id, userId, status: 'idle' });
    this.logger.info('Client registered', { clientId: id, userId });
    return id;
  }

  /** Forgets the client entirely, leaving any queue or match it was in. */
  unregister(id: string): boolean {
    const known = this.clients.has(id);
    this.disconnect(id);
    return known;
  }

  isRegistered(id: string): boolean {
    return this.clients.has(id);
  }

  isConnected(id: string): boolean {
    return this.clients.get(id)?.sender !== undefined;
  }

  /** Attaches the client's outbound channel. Returns false for unknown or already-connected ids. */
  connect(id: string, sender: MessageSender): boolean {
    const client = this.clients.get(id);
    if (!client || client.sender) return false;
    client.sender = new RetryingSender(sender, this.sendRetries, this.logger, { clientId: id });
    return true;
  }

  disconnect(id: string): void {
    const client = this.clients.get(id);
    if (!client) return;
    this.clients.delete(id);
    if (this.waitingId === id) {
      this.waitingId = undefined;
    }
    const room = client.matchId === undefined ? undefined : this.matches.get(client.matchId);
    if (room) {
      this.logger.info('Client left a running match', { clientId: id, matchId: room.id });
      this.endMatch(room);
    }
  }

  getStatus(id: string): ClientStatus | undefined {
    return this.clients.get(id)?.status;
  }

  getMatchFor(id: string): Match | undefined {
    const matchId = this.clients.get(id)?.matchId;
    return matchId === undefined ? undefined : this.matches.get(matchId)?.match;
  }

  handleMessage(id: string, raw: string): void {
    const message = raw.trim();
    if (message === 'ping') return;

    const client = this.clients.get(id);
    if (!client) {
      this.logger.error('Message from a client that is not registered', { clientId: id });
      return;
    }

    switch (client.status) {
      case 'inMatch':
        this.forwardToMatch(client, message);
        return;
      case 'idle':
        if (message === 'join') {
          this.join(client);
        } else {
          this.logger.debug('Ignoring message from idle client', { clientId: id });
        }
        return;
      case 'waiting':
        this.logger.debug('Ignoring message while waiting for an opponent', { clientId: id });
        return;
    }
  }

  get clientCount(): number {
    return this.clients.size;
  }

  get matchCount(): number {
    return this.matches.size;
  }

  get waitingClientId(): string | undefined {
    return this.waitingId;
  }

  private join(client: Client): void {
    const opponent = this.waitingId === undefined ? undefined : this.clients.get(this.waitingId);
    if (!opponent) {
      client.status = 'waiting';
      this.waitingId = client.id;
      this.logger.info('Client waiting for an opponent', { clientId: client.id });
      return;
    }

    const player1 = this.senderOf(client);
    const player2 = this.senderOf(opponent);
    this.waitingId = undefined;
    // The client that asked last plays as player1
    const match = new Match([client.id, opponent.id], this.createGameState, this.logger);
    const room: MatchRoom = { id: uuidv4(), match };
    this.matches.set(room.id, room);
    for (const member of [client, opponent]) {
      member.status = 'inMatch';
      member.matchId = room.id;
    }
    this.logger.info('Match started', { matchId: room.id, player1: client.id, player2: opponent.id });
    match.start(player1, player2);
  }

  private forwardToMatch(client: Client, message: string): void {
    const room = client.matchId === undefined ? undefined : this.matches.get(client.matchId);
    if (!room) {
      this.logger.error('Client is marked in a match that does not exist', { clientId: client.id });
      client.status = 'idle';
      client.matchId = undefined;
      return;
    }

    const { match } = room;
    try {
      const opponent = this.clients.get(match.opponentId(client.id));
      if (!opponent) {
        throw new InvariantError(`Opponent of ${client.id} is no longer registered`);
      }
      match.handleMessage(match.playerNum(client.id), message, this.senderOf(client), this.senderOf(opponent));
    } catch (err) {
      if (err instanceof InvariantError) {
        this.logger.error('Match invariant violated, ending match', { matchId: room.id, error: err.message });
        this.endMatch(room);
        return;
      }
      throw err;
    }

    if (match.isOver()) {
      this.logger.info('Match over', { matchId: room.id });
      this.endMatch(room);
    }
  }

  private endMatch(room: MatchRoom): void {
    this.matches.delete(room.id);
    for (const id of room.match.playerIds) {
      const client = this.clients.get(id);
      if (!client) continue;
      client.status = 'idle';
      client.matchId = undefined;
      client.sender?.send(LEAVE_MESSAGE);
    }
  }

  private senderOf(client: Client): MessageSender {
    if (!client.sender) {
      throw new InvariantError(`Client ${client.id} has no open connection`);
    }
    return client.sender;
  }
}
