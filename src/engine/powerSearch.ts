import { getSimulationConfig } from '../config/simulation';
import { DEFAULT_ATTACK_POWER } from '../constants/board';
import type { BattleOutcome, CombatState, PowerSearchResult } from '../types';
import { runToCompletion } from './battleEngine';
import { countDeaths, withElfPower } from './combatState';
import { PowerSearchExhaustedError } from './errors';

export interface PowerAttempt {
  power: number;
  outcome: BattleOutcome;
  elfDeaths: number;
}

export interface PowerSearchOptions {
  floor?: number;
  ceiling?: number;
  maxRounds?: number;
  onAttempt?: (attempt: PowerAttempt) => void;
}

/** Replays the battle from a pristine copy of `initialState` with the given elf power. */
export const attemptWithPower = (
  initialState: CombatState,
  power: number,
  maxRounds: number = getSimulationConfig().maxRounds
): PowerAttempt => {
  const state = withElfPower(initialState, power);
  const outcome = runToCompletion(state, { maxRounds });
  return { power, outcome, elfDeaths: countDeaths(state, 'elf') };
};

/**
 * Finds the smallest elf attack power at which no elf dies.
 *
 * Linear scan upward from `floor`. Elf deaths are not guaranteed to fall as
 * power rises, so the search must not bisect.
 */
export const searchMinimalPower = (
  initialState: CombatState,
  {
    floor = DEFAULT_ATTACK_POWER + 1,
    ceiling = getSimulationConfig().powerCeiling,
    maxRounds = getSimulationConfig().maxRounds,
    onAttempt
  }: PowerSearchOptions = {}
): PowerSearchResult => {
  for (let power = floor; power <= ceiling; power += 1) {
    const attempt = attemptWithPower(initialState, power, maxRounds);
    onAttempt?.(attempt);

    if (attempt.elfDeaths === 0) {
      return { rounds: attempt.outcome.rounds, remainingHp: attempt.outcome.remainingHp, power };
    }
  }

  throw new PowerSearchExhaustedError(floor, ceiling);
};
