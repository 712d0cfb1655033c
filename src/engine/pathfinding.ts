import type { CombatState, Position } from '../types';
import { boardContains, compareReadingOrder, orthogonalNeighbors, positionKey } from './board';
import { isOccupied } from './combatState';

export interface PathStep {
  distance: number;
  firstStep: Position;
}

interface FrontierNode {
  position: Position;
  firstStep: Position;
}

const compareFrontier = (a: FrontierNode, b: FrontierNode) =>
  compareReadingOrder(a.firstStep, b.firstStep) || compareReadingOrder(a.position, b.position);

const isPassable = (state: CombatState, pos: Position) => boardContains(state.board, pos) && !isOccupied(state, pos);

/**
 * Breadth-first search from `start` toward every destination at once.
 *
 * Each ring of the frontier is expanded in (firstStep, position) reading order
 * and a tile belongs to whichever expansion reaches it first. That is the same
 * visiting order as a priority queue keyed on (steps, firstStep, position), so
 * every tile records the reading-order-smallest first step among its shortest
 * paths.
 *
 * The result is keyed by boardKey; unreachable destinations are absent.
 */
export const findShortestPaths = (
  state: CombatState,
  start: Position,
  destinations: Position[]
): Map<string, PathStep> => {
  const wanted = new Set(destinations.map(positionKey));
  const found = new Map<string, PathStep>();

  const startKey = positionKey(start);
  if (wanted.has(startKey)) {
    found.set(startKey, { distance: 0, firstStep: { ...start } });
  }

  const seen = new Set<string>([startKey]);
  let frontier: FrontierNode[] = [{ position: start, firstStep: start }];
  let distance = 0;

  while (frontier.length > 0 && found.size < wanted.size) {
    distance += 1;
    const next: FrontierNode[] = [];

    for (const node of frontier.sort(compareFrontier)) {
      for (const neighbor of orthogonalNeighbors(node.position)) {
        const key = positionKey(neighbor);
        if (seen.has(key) || !isPassable(state, neighbor)) {
          continue;
        }
        seen.add(key);

        const firstStep = distance === 1 ? neighbor : node.firstStep;
        next.push({ position: neighbor, firstStep });
        if (wanted.has(key)) {
          found.set(key, { distance, firstStep: { ...firstStep } });
        }
      }
    }

    frontier = next;
  }

  return found;
};

export const shortestPath = (state: CombatState, start: Position, destination: Position): PathStep | null =>
  findShortestPaths(state, start, [destination]).get(positionKey(destination)) ?? null;
