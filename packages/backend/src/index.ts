export { Match } from './Match.js';
export type { GameStateFactory } from './Match.js';
export { MatchManager, LEAVE_MESSAGE } from './MatchManager.js';
export type { MatchManagerOptions } from './MatchManager.js';
export { RetryingSender } from './retry.js';
export { createServer } from './server.js';
export type { ServerOptions, InkgridServer } from './server.js';
export { createLogger, silentLogger } from './logger.js';
export { ConfigError, EnvSchema, loadConfig, parseConfig } from './config.js';
export type { LogFormat, LogLevel, ServerConfig } from './config.js';
export type {
  ClientStatus,
  GameOutcome,
  LogMeta,
  MatchLogger,
  MessageSender,
  ProtocolState,
  SendResult,
  ServerMessage,
  Slots,
} from './types.js';
