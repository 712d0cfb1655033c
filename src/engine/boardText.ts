import { getSimulationConfig } from '../config/simulation';
import { DEFAULT_ATTACK_POWER, FACTIONS, FACTION_GLYPHS, FLOOR_GLYPH, WALL_GLYPH, boardKey } from '../constants/board';
import type { CombatState, CombatUnit, Faction, Position } from '../types';
import { createBoard } from './board';
import { createCombatState, livingUnits } from './combatState';
import { BoardParseError } from './errors';

export interface ParseOptions {
  startingHp?: number;
  elfPower?: number;
}

const GLYPH_TO_FACTION = new Map<string, Faction>(FACTIONS.map((faction): [string, Faction] => [FACTION_GLYPHS[faction], faction]));

const splitRows = (text: string): string[] => {
  const lines = text.split(/\r?\n/);
  while (lines.length > 0 && lines[lines.length - 1].trim() === '') {
    lines.pop();
  }
  return lines;
};

/**
 * Scans the map text into a battle state. `#` is wall, `.` is floor and each
 * faction glyph is floor with a unit standing on it.
 */
export const parseInitialState = (
  text: string,
  { startingHp = getSimulationConfig().startingHp, elfPower = DEFAULT_ATTACK_POWER }: ParseOptions = {}
): CombatState => {
  const rows = splitRows(text);
  const tiles: Position[] = [];
  const units: CombatUnit[] = [];
  const counters: Record<Faction, number> = { elf: 0, goblin: 0 };

  rows.forEach((line, row) => {
    Array.from(line).forEach((glyph, col) => {
      if (glyph === WALL_GLYPH) return;

      const faction = GLYPH_TO_FACTION.get(glyph);
      if (glyph !== FLOOR_GLYPH && !faction) {
        throw new BoardParseError(glyph, { row, col });
      }

      tiles.push({ row, col });
      if (faction) {
        units.push({ id: `${faction}-${counters[faction]}`, faction, position: { row, col }, hp: startingHp });
        counters[faction] += 1;
      }
    });
  });

  const cols = rows.reduce((widest, line) => Math.max(widest, line.length), 0);
  return createCombatState(createBoard(rows.length, cols, tiles), units, elfPower);
};

export interface RenderOptions {
  showHp?: boolean;
}

/** Draws the board with living units; optionally lists each row's units and hit points. */
export const renderState = (state: CombatState, { showHp = false }: RenderOptions = {}): string => {
  const unitsByTile = new Map(
    livingUnits(state).map((unit): [string, CombatUnit] => [boardKey(unit.position.row, unit.position.col), unit])
  );
  const lines: string[] = [];

  for (let row = 0; row < state.board.rows; row += 1) {
    let line = '';
    const rowUnits: CombatUnit[] = [];
    for (let col = 0; col < state.board.cols; col += 1) {
      const key = boardKey(row, col);
      const unit = unitsByTile.get(key);
      if (unit) {
        rowUnits.push(unit);
        line += FACTION_GLYPHS[unit.faction];
      } else {
        line += state.board.tiles.has(key) ? FLOOR_GLYPH : WALL_GLYPH;
      }
    }

    if (showHp && rowUnits.length > 0) {
      line += `   ${rowUnits.map((unit) => `${FACTION_GLYPHS[unit.faction]}(${unit.hp})`).join(', ')}`;
    }
    lines.push(line);
  }

  return lines.join('\n');
};
