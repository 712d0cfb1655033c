import type { CombatUnit, Faction, Position } from '.';

export interface MoveEvent {
  unitId: string;
  from: Position;
  to: Position;
}

export interface HitEvent {
  attackerId: string;
  attackerFaction: Faction;
  targetId: string;
  targetPosition: Position;
  damage: number;
  didKill: boolean;
}

export interface RoundRecorder {
  recordMove: (event: MoveEvent) => void;
  recordHit: (event: HitEvent) => void;
}

export type RoundResult =
  | { status: 'continuing' }
  | { status: 'ended'; winner: Faction | null; completed: boolean };

export interface RoundFrame {
  round: number;
  units: CombatUnit[];
  moves: MoveEvent[];
  hits: HitEvent[];
  partial: boolean;
}
