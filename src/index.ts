export type { Board, BattleOutcome, CombatState, CombatUnit, Faction, Position, PowerSearchResult } from './types';
export type { HitEvent, MoveEvent, RoundFrame, RoundRecorder, RoundResult } from './types/battle';
export { compareReadingOrder, boardContains, createBoard, orthogonalNeighbors } from './engine/board';
export {
  assertOccupancyInvariant,
  cloneCombatState,
  countDeaths,
  createCombatState,
  livingUnits
} from './engine/combatState';
export { findShortestPaths, shortestPath, type PathStep } from './engine/pathfinding';
export { chooseAttackTarget, chooseMove, type MoveDecision } from './engine/targeting';
export { battleScore, playRound, runToCompletion, type RunOptions } from './engine/battleEngine';
export { searchMinimalPower, type PowerAttempt, type PowerSearchOptions } from './engine/powerSearch';
export { recordBattle, type RecordedBattle } from './engine/battleReplay';
export { parseInitialState, renderState, type ParseOptions, type RenderOptions } from './engine/boardText';
export {
  BoardParseError,
  ConfigError,
  InvariantViolationError,
  PowerSearchExhaustedError,
  RoundLimitError
} from './engine/errors';
export { getSimulationConfig, loadSimulationConfig, type SimulationConfig } from './config/simulation';
