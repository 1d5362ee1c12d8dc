export { LineQueue, type EnginePeer } from './EnginePeer';
export { InProcessPeer } from './InProcessPeer';
export { ChildProcessPeer, splitCommand } from './ChildProcessPeer';
export { EngineClient, DEFAULT_RESPONSE_TIMEOUT_MS } from './EngineClient';
export {
  playGame,
  runMatch,
  DEFAULT_GAME_OPTIONS,
  type GameEndReason,
  type GameOptions,
  type GameRecord,
  type MatchOptions,
  type MatchResult,
} from './referee';
