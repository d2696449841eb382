import { createGame, type Game } from "../src/game.js";
import type { GameOptions, GameState, Position, RandomSource } from "../src/types.js";

/** Returns `values` in order, then `fallback` forever. */
export function scripted(values: number[], fallback = 0.99): RandomSource {
  let i = 0;
  return () => (i < values.length ? values[i++] : fallback);
}

export const at = (x: number, y: number): Position => ({ x, y });

export function makeState(overrides: Partial<GameState> = {}): GameState {
  const base: GameState = {
    tick: 0,
    status: "running",
    gridWidth: 10,
    gridHeight: 10,
    snake: [at(5, 5), at(4, 5), at(3, 5)],
    heading: "RIGHT",
    food: at(0, 0),
    obstacles: [],
    powerUps: [],
    stats: {
      score: 0,
      highScore: 0,
      level: 1,
      speed: 10,
      invincible: false,
      invincibleTicks: 0,
    },
  };
  return {
    ...base,
    ...overrides,
    stats: { ...base.stats, ...overrides.stats },
  };
}

/**
 * Game loaded with `state`. Chance rolls are off unless `options` turns them
 * on, and placement draws come from `options.random` (default 0.5).
 */
export function setup(state: GameState, options: Partial<GameOptions> = {}): Game {
  const game = createGame({
    gridWidth: state.gridWidth,
    gridHeight: state.gridHeight,
    random: () => 0.5,
    powerUpChance: 0,
    obstacleGrowthChance: 0,
  });
  game.loadState(state);
  game.updateOptions(options);
  return game;
}
