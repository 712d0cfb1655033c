import type { Faction } from '../types';

export const WALL_GLYPH = '#';
export const FLOOR_GLYPH = '.';

export const FACTION_GLYPHS: Record<Faction, string> = {
  elf: 'E',
  goblin: 'G'
};

export const FACTIONS: Faction[] = ['elf', 'goblin'];

export const STARTING_HP = 200;
export const DEFAULT_ATTACK_POWER = 3;

export const boardKey = (row: number, col: number) => `${row}-${col}`;
