/**
 * Core Engine Module
 *
 * Game lifecycle state, round sequencing, typed game events
 * and diagnostics logging.
 */
export const ENGINE_VERSION = '0.1.0';

// Game state types and factory
export type { GamePhase, PlayerInfo, GameState, GameStateOptions } from './GameState';
export { createGameState } from './GameState';

// Round sequencer functions
export { isGameOver, advanceRound, startGame, endGame } from './RoundSequencer';

// Game event system
export type {
  RoundStartedPayload,
  CardsPlayedPayload,
  RoundCompletedPayload,
  GameEndedPayload,
  GameEventMap,
  GameEventName,
  GameEventListener,
} from './GameEventEmitter';
export { GameEventEmitter } from './GameEventEmitter';

// Logging
export type { LogLevel, LogContext } from './Logger';
export {
  logDebug,
  logInfo,
  logWarn,
  logError,
  setLogLevel,
  resolveLogLevel,
  isLogLevel,
} from './Logger';
