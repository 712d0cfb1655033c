import { getSimulationConfig } from '../config/simulation';
import type { BattleOutcome, CombatState } from '../types';
import type { RoundRecorder, RoundResult } from '../types/battle';
import { samePosition } from './board';
import { applyAttackToUnit } from './attackResolution';
import { isAlive, livingFactions, livingUnits, relocateUnit, sortUnitsByPosition } from './combatState';
import { RoundLimitError } from './errors';
import { chooseAttackTarget, chooseMove } from './targeting';

export interface RunOptions {
  maxRounds?: number;
}

/**
 * Plays one round in place: every living unit, in list order, moves one step
 * and then attacks.
 *
 * When an acting unit finds no enemy left the round stops right there and is
 * reported as incomplete, even though earlier units already acted. Otherwise
 * the units are re-sorted into reading order for the next round. A board with
 * nobody on it ends before anything happens.
 */
export const playRound = (state: CombatState, recorder?: RoundRecorder): RoundResult => {
  if (livingUnits(state).length === 0) {
    return { status: 'ended', winner: null, completed: false };
  }

  for (const unit of state.units) {
    if (!isAlive(unit)) {
      continue;
    }

    const decision = chooseMove(state, unit);
    if (decision.kind === 'no-enemies') {
      return { status: 'ended', winner: unit.faction, completed: false };
    }
    if (decision.kind === 'blocked') {
      continue;
    }

    if (!samePosition(decision.step, unit.position)) {
      const from = { ...unit.position };
      relocateUnit(state, unit, decision.step);
      recorder?.recordMove({ unitId: unit.id, from, to: { ...unit.position } });
    }

    const target = chooseAttackTarget(state, unit);
    if (!target) {
      continue;
    }

    const result = applyAttackToUnit(state, unit, target);
    recorder?.recordHit({
      attackerId: unit.id,
      attackerFaction: unit.faction,
      targetId: target.id,
      targetPosition: { ...target.position },
      damage: result.damageToHp,
      didKill: result.didKill
    });
  }

  sortUnitsByPosition(state);

  const standing = Array.from(livingFactions(state));
  if (standing.length < 2) {
    return { status: 'ended', winner: standing[0] ?? null, completed: true };
  }
  return { status: 'continuing' };
};

export const remainingHp = (state: CombatState): number =>
  livingUnits(state).reduce((total, unit) => total + unit.hp, 0);

/**
 * Runs the battle in place until one side is gone. Only fully completed
 * rounds are counted, and a count above `maxRounds` raises `RoundLimitError`.
 */
export const runToCompletion = (
  state: CombatState,
  { maxRounds = getSimulationConfig().maxRounds }: RunOptions = {}
): BattleOutcome => {
  let rounds = 0;

  for (;;) {
    const result = playRound(state);
    if (result.status === 'continuing' || result.completed) {
      rounds += 1;
    }
    if (rounds > maxRounds) {
      throw new RoundLimitError(maxRounds);
    }
    if (result.status === 'ended') {
      return { rounds, remainingHp: remainingHp(state), winner: result.winner };
    }
  }
};

export const battleScore = ({ rounds, remainingHp }: Pick<BattleOutcome, 'rounds' | 'remainingHp'>): number =>
  rounds * remainingHp;
