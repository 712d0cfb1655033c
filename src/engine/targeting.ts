import type { CombatState, CombatUnit, Position } from '../types';
import { boardContains, compareReadingOrder, orthogonalNeighbors, positionKey, samePosition } from './board';
import { isAlive, isOccupied } from './combatState';
import { findShortestPaths } from './pathfinding';

export type MoveDecision =
  | { kind: 'no-enemies' }
  | { kind: 'blocked' }
  | {
      kind: 'advance';
      destination: Position;
      target: CombatUnit;
      distance: number;
      step: Position;
    };

interface Candidate {
  destination: Position;
  target: CombatUnit;
}

interface RankedCandidate extends Candidate {
  distance: number;
  step: Position;
}

const compareCandidates = (a: RankedCandidate, b: RankedCandidate) =>
  a.distance - b.distance ||
  compareReadingOrder(a.destination, b.destination) ||
  compareReadingOrder(a.target.position, b.target.position);

const enemiesOf = (state: CombatState, actor: CombatUnit) =>
  state.units.filter((unit) => unit.faction !== actor.faction && isAlive(unit));

// Tiles the actor could stand on to fight `enemy`. Its own tile counts even though it is occupied.
const openTilesAround = (state: CombatState, enemy: CombatUnit, actor: CombatUnit): Position[] =>
  orthogonalNeighbors(enemy.position).filter(
    (pos) => samePosition(pos, actor.position) || (boardContains(state.board, pos) && !isOccupied(state, pos))
  );

/**
 * Picks where the actor heads this turn: the nearest tile next to any living
 * enemy, ties broken by reading order of that tile and then of the enemy.
 */
export const chooseMove = (state: CombatState, actor: CombatUnit): MoveDecision => {
  const enemies = enemiesOf(state, actor);
  if (enemies.length === 0) {
    return { kind: 'no-enemies' };
  }

  const candidates: Candidate[] = enemies.flatMap((target) =>
    openTilesAround(state, target, actor).map((destination) => ({ destination, target }))
  );
  const paths = findShortestPaths(
    state,
    actor.position,
    candidates.map((c) => c.destination)
  );

  const ranked: RankedCandidate[] = candidates.flatMap((candidate) => {
    const path = paths.get(positionKey(candidate.destination));
    return path ? [{ ...candidate, distance: path.distance, step: path.firstStep }] : [];
  });

  const best = ranked.sort(compareCandidates)[0];
  if (!best) {
    return { kind: 'blocked' };
  }
  return { kind: 'advance', ...best };
};

/** Adjacent living enemy with the fewest hit points; reading order breaks ties. */
export const chooseAttackTarget = (state: CombatState, actor: CombatUnit): CombatUnit | null => {
  const adjacent = new Set(orthogonalNeighbors(actor.position).map(positionKey));
  const inReach = state.units.filter(
    (unit) => unit.faction !== actor.faction && isAlive(unit) && adjacent.has(positionKey(unit.position))
  );

  return (
    inReach.sort((a, b) => a.hp - b.hp || compareReadingOrder(a.position, b.position))[0] ?? null
  );
};
