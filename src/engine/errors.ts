import type { Position } from '../types';

export class BoardParseError extends Error {
  constructor(
    readonly glyph: string,
    readonly position: Position
  ) {
    super(`Unrecognized map character "${glyph}" at row ${position.row}, column ${position.col}`);
    this.name = 'BoardParseError';
  }
}

/** Raised when the unit list and the occupancy index disagree. Never recoverable. */
export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}

export class RoundLimitError extends Error {
  constructor(readonly maxRounds: number) {
    super(`Battle did not finish within ${maxRounds} rounds`);
    this.name = 'RoundLimitError';
  }
}

export class PowerSearchExhaustedError extends Error {
  constructor(
    readonly floor: number,
    readonly ceiling: number
  ) {
    super(`No elf attack power between ${floor} and ${ceiling} wins without losses`);
    this.name = 'PowerSearchExhaustedError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
