// Position on the battle board, row first so it sorts into reading order
export interface Position {
  row: number;
  col: number;
}

export type Faction = 'elf' | 'goblin';

// Unit instance tracked through a battle. Dead units keep their slot and last position.
export interface CombatUnit {
  id: string;
  faction: Faction;
  position: Position;
  hp: number;
}

// Walkable tiles of a parsed map, keyed by boardKey
export interface Board {
  rows: number;
  cols: number;
  tiles: ReadonlySet<string>;
}

export interface CombatState {
  board: Board;
  units: CombatUnit[];
  occupied: Set<string>;
  attackPower: Record<Faction, number>;
}

export interface BattleOutcome {
  rounds: number;
  remainingHp: number;
  winner: Faction | null;
}

export interface PowerSearchResult {
  rounds: number;
  remainingHp: number;
  power: number;
}
