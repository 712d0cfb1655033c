import { parseInitialState } from '../src/engine/boardText';
import type { CombatState, CombatUnit } from '../src/types';

export const layout = (...rows: string[]) => rows.join('\n');

export const unitAt = (state: CombatState, row: number, col: number): CombatUnit => {
  const unit = state.units.find((u) => u.hp > 0 && u.position.row === row && u.position.col === col);
  if (!unit) {
    throw new Error(`No living unit at ${row},${col}`);
  }
  return unit;
};

export const unitById = (state: CombatState, id: string): CombatUnit => {
  const unit = state.units.find((u) => u.id === id);
  if (!unit) {
    throw new Error(`No unit ${id}`);
  }
  return unit;
};

// Living units as compact tuples so round expectations read like the board
export const snapshot = (state: CombatState) =>
  state.units.filter((u) => u.hp > 0).map((u) => [u.id, u.position.row, u.position.col, u.hp]);

export const stateOf = (...rows: string[]) => parseInitialState(layout(...rows));
