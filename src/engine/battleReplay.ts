import { getSimulationConfig } from '../config/simulation';
import type { BattleOutcome, CombatState } from '../types';
import type { HitEvent, MoveEvent, RoundFrame } from '../types/battle';
import { playRound, remainingHp } from './battleEngine';
import { cloneCombatState, cloneUnits } from './combatState';
import { RoundLimitError } from './errors';

export interface RecordedBattle {
  outcome: BattleOutcome;
  timeline: RoundFrame[];
}

/**
 * Runs a full battle on a copy of `initialState` and keeps one frame per round.
 * Frame 0 is the starting layout; a round cut short by the end of the battle
 * gets a final frame flagged `partial`.
 */
export function recordBattle(
  initialState: CombatState,
  { maxRounds = getSimulationConfig().maxRounds }: { maxRounds?: number } = {}
): RecordedBattle {
  const state = cloneCombatState(initialState);
  const timeline: RoundFrame[] = [
    { round: 0, units: cloneUnits(state.units), moves: [], hits: [], partial: false }
  ];

  let rounds = 0;
  for (;;) {
    const moves: MoveEvent[] = [];
    const hits: HitEvent[] = [];
    const result = playRound(state, {
      recordMove: (event) => moves.push(event),
      recordHit: (event) => hits.push(event)
    });

    const completed = result.status === 'continuing' || result.completed;
    if (completed) {
      rounds += 1;
    }
    if (rounds > maxRounds) {
      throw new RoundLimitError(maxRounds);
    }
    if (completed || moves.length > 0 || hits.length > 0) {
      timeline.push({
        round: completed ? rounds : rounds + 1,
        units: cloneUnits(state.units),
        moves,
        hits,
        partial: !completed
      });
    }

    if (result.status === 'ended') {
      return { outcome: { rounds, remainingHp: remainingHp(state), winner: result.winner }, timeline };
    }
  }
}
