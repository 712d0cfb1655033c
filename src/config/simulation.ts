import { STARTING_HP } from '../constants/board';
import { ConfigError } from '../engine/errors';

// Battle limits - each can be overridden via environment variable
const DEFAULT_MAX_ROUNDS = 10_000;
const DEFAULT_POWER_CEILING = STARTING_HP;

type Env = Record<string, string | undefined>;

export function readPositiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

export function loadSimulationConfig(env: Env = process.env) {
  return Object.freeze({
    maxRounds: readPositiveInt(env, 'SKIRMISH_MAX_ROUNDS', DEFAULT_MAX_ROUNDS),
    powerCeiling: readPositiveInt(env, 'SKIRMISH_POWER_CEILING', DEFAULT_POWER_CEILING),
    startingHp: readPositiveInt(env, 'SKIRMISH_STARTING_HP', STARTING_HP)
  });
}

export type SimulationConfig = ReturnType<typeof loadSimulationConfig>;

let cached: SimulationConfig | null = null;

// Read on first use, not at import
export function getSimulationConfig(): SimulationConfig {
  if (!cached) {
    cached = loadSimulationConfig();
  }
  return cached;
}
