import type { CombatState, CombatUnit } from '../types';
import { positionKey } from './board';
import { isAlive, releaseTile } from './combatState';
import { InvariantViolationError } from './errors';

export interface AttackResolutionInput {
  damage: number;
  targetHp: number;
}

export interface AttackResolutionResult {
  newHp: number;
  damageToHp: number;
  didKill: boolean;
}

/**
 * Flat damage: the attacker's power comes straight off the target's hit points.
 * Hit points may go below zero; anything at or under zero is dead.
 */
export const resolveAttack = ({ damage, targetHp }: AttackResolutionInput): AttackResolutionResult => {
  const newHp = targetHp - damage;
  return {
    newHp,
    damageToHp: damage,
    didKill: newHp <= 0
  };
};

/**
 * Applies an attack to a live unit instance, mutating its HP and freeing its
 * tile in the occupancy index when it dies.
 */
export const applyAttackToUnit = (
  state: CombatState,
  attacker: CombatUnit,
  target: CombatUnit
): AttackResolutionResult => {
  if (!isAlive(target) || target.faction === attacker.faction || !state.occupied.has(positionKey(target.position))) {
    throw new InvariantViolationError(
      `${attacker.id} cannot attack ${target.id} at ${positionKey(target.position)}: not a living enemy on the board`
    );
  }

  const result = resolveAttack({ damage: state.attackPower[attacker.faction], targetHp: target.hp });
  target.hp = result.newHp;
  if (result.didKill) {
    releaseTile(state, target);
  }

  return result;
};
