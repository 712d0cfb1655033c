/**
 * Runs a skirmish map to completion, then searches for the smallest elf
 * attack power that wins without losing an elf.
 *
 * Usage:
 *   npx tsx scripts/simulate-battle.ts --input inputs/skirmish.txt [--power 4] [--max-rounds 500] [--show-board]
 */

import * as fs from 'fs';
import * as path from 'path';
import { parseArgs } from 'util';
import { DEFAULT_ATTACK_POWER } from '../src/constants/board';
import { loadSimulationConfig, readPositiveInt } from '../src/config/simulation';
import { battleScore, runToCompletion } from '../src/engine/battleEngine';
import { parseInitialState, renderState } from '../src/engine/boardText';
import { cloneCombatState } from '../src/engine/combatState';
import { searchMinimalPower } from '../src/engine/powerSearch';

const DEFAULT_INPUT = path.join('inputs', 'skirmish.txt');

function main(): void {
  const { values } = parseArgs({
    options: {
      input: { type: 'string', short: 'i', default: DEFAULT_INPUT },
      power: { type: 'string', short: 'p' },
      'max-rounds': { type: 'string' },
      'show-board': { type: 'boolean', default: false }
    }
  });

  const config = loadSimulationConfig();
  const flags = { '--power': values.power, '--max-rounds': values['max-rounds'] };
  const floor = readPositiveInt(flags, '--power', DEFAULT_ATTACK_POWER + 1);
  const maxRounds = readPositiveInt(flags, '--max-rounds', config.maxRounds);

  const inputPath = path.resolve(process.cwd(), values.input ?? DEFAULT_INPUT);
  console.log(`[battle] Using input ${inputPath}`);

  const initial = parseInitialState(fs.readFileSync(inputPath, 'utf-8'), { startingHp: config.startingHp });

  const battle = cloneCombatState(initial);
  const outcome = runToCompletion(battle, { maxRounds });
  if (values['show-board']) {
    console.log(renderState(battle, { showHp: true }));
  }
  console.log(
    `[battle] ${outcome.winner ?? 'nobody'} win after ${outcome.rounds} rounds with ${outcome.remainingHp} hp left. Score: ${battleScore(outcome)}`
  );

  const result = searchMinimalPower(initial, {
    floor,
    ceiling: config.powerCeiling,
    maxRounds,
    onAttempt: ({ power, outcome: attempt, elfDeaths }) => {
      console.log(
        `[search] power ${power}: ${attempt.winner ?? 'nobody'} win with ${attempt.remainingHp} hp after ${attempt.rounds} rounds, ${elfDeaths} elf deaths`
      );
    }
  });

  console.log(
    `[search] Elves win with ${result.power} power after ${result.rounds} rounds with ${result.remainingHp} hp left. Score: ${battleScore(result)}`
  );
}

try {
  main();
} catch (error) {
  console.error('[error]', error instanceof Error ? error.message : error);
  process.exit(1);
}
