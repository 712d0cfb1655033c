import { DEFAULT_ATTACK_POWER } from '../constants/board';
import type { Board, CombatState, CombatUnit, Faction, Position } from '../types';
import { compareReadingOrder, positionKey } from './board';
import { InvariantViolationError } from './errors';

export const isAlive = (unit: CombatUnit) => unit.hp > 0;

const cloneUnit = (unit: CombatUnit): CombatUnit => ({ ...unit, position: { ...unit.position } });

export const cloneUnits = (units: CombatUnit[]): CombatUnit[] => units.map(cloneUnit);

const occupancyOf = (units: CombatUnit[]) => new Set(units.filter(isAlive).map((unit) => positionKey(unit.position)));

/**
 * Builds a fresh battle state. Units are put into reading order of their
 * positions, which is the turn order of the first round.
 */
export const createCombatState = (
  board: Board,
  units: CombatUnit[],
  elfPower: number = DEFAULT_ATTACK_POWER
): CombatState => {
  const ordered = cloneUnits(units).sort((a, b) => compareReadingOrder(a.position, b.position));
  return {
    board,
    units: ordered,
    occupied: occupancyOf(ordered),
    attackPower: { elf: elfPower, goblin: DEFAULT_ATTACK_POWER }
  };
};

/** Copies units, occupancy and powers; the board is shared. */
export const cloneCombatState = (state: CombatState): CombatState => ({
  board: state.board,
  units: cloneUnits(state.units),
  occupied: new Set(state.occupied),
  attackPower: { ...state.attackPower }
});

export const withElfPower = (state: CombatState, power: number): CombatState => {
  const cloned = cloneCombatState(state);
  cloned.attackPower.elf = power;
  return cloned;
};

export const isOccupied = (state: CombatState, pos: Position) => state.occupied.has(positionKey(pos));

export const relocateUnit = (state: CombatState, unit: CombatUnit, to: Position): void => {
  state.occupied.delete(positionKey(unit.position));
  unit.position = { ...to };
  state.occupied.add(positionKey(unit.position));
};

export const releaseTile = (state: CombatState, unit: CombatUnit): void => {
  state.occupied.delete(positionKey(unit.position));
};

export const livingUnits = (state: CombatState): CombatUnit[] => state.units.filter(isAlive);

export const livingFactions = (state: CombatState): Set<Faction> =>
  new Set(livingUnits(state).map((unit) => unit.faction));

export const countDeaths = (state: CombatState, faction: Faction): number =>
  state.units.filter((unit) => unit.faction === faction && !isAlive(unit)).length;

export const sortUnitsByPosition = (state: CombatState): void => {
  state.units.sort((a, b) => compareReadingOrder(a.position, b.position));
};

export const assertOccupancyInvariant = (state: CombatState): void => {
  const expected = occupancyOf(state.units);
  const mismatch =
    expected.size !== state.occupied.size || Array.from(expected).some((key) => !state.occupied.has(key));
  if (mismatch) {
    throw new InvariantViolationError(
      `Occupancy [${Array.from(state.occupied).sort().join(', ')}] does not match living units [${Array.from(expected).sort().join(', ')}]`
    );
  }
};
