import type { Direction, Position, PowerUp, PowerUpKind, RandomSource } from "./types.js";

export const POWER_UP_KINDS: readonly PowerUpKind[] = ["speed", "invincible", "bonus"];

const MAX_RANDOM_ATTEMPTS = 100;

export const OBSTACLE_LIMIT = 20;

export function randomInt(min: number, max: number, random: RandomSource = Math.random): number {
  return Math.floor(random() * (max - min)) + min;
}

export function positionKey(p: Position): string {
  return `${p.x},${p.y}`;
}

export function samePosition(a: Position, b: Position): boolean {
  return a.x === b.x && a.y === b.y;
}

export function isInBounds(p: Position, width: number, height: number): boolean {
  return p.x >= 0 && p.x < width && p.y >= 0 && p.y < height;
}

export function movePosition(p: Position, direction: Direction): Position {
  switch (direction) {
    case "UP":    return { x: p.x, y: p.y - 1 };
    case "DOWN":  return { x: p.x, y: p.y + 1 };
    case "LEFT":  return { x: p.x - 1, y: p.y };
    case "RIGHT": return { x: p.x + 1, y: p.y };
  }
}

export function getOppositeDirection(dir: Direction): Direction {
  const opposites: Record<Direction, Direction> = {
    UP: "DOWN", DOWN: "UP", LEFT: "RIGHT", RIGHT: "LEFT",
  };
  return opposites[dir];
}

/** Obstacle cap for a grid: one per 20 cells, never more than `limit` or 20. */
export function obstacleCap(width: number, height: number, limit = OBSTACLE_LIMIT): number {
  return Math.min(OBSTACLE_LIMIT, limit, Math.floor((width * height) / 20));
}

export function buildOccupiedSet(...groups: Array<readonly Position[]>): Set<string> {
  const set = new Set<string>();
  for (const group of groups) {
    for (const p of group) {
      set.add(positionKey(p));
    }
  }
  return set;
}

/**
 * Uniform random free cell. Rejection sampling first; if every draw lands on
 * an occupied cell the free cells are enumerated and one is picked from
 * those, so a nearly full grid still terminates. Null means the grid is full.
 */
export function placeRandom(
  exclusions: Set<string>,
  width: number,
  height: number,
  random: RandomSource = Math.random,
): Position | null {
  if (width <= 0 || height <= 0) return null;

  for (let i = 0; i < MAX_RANDOM_ATTEMPTS; i++) {
    const pos: Position = {
      x: randomInt(0, width, random),
      y: randomInt(0, height, random),
    };
    if (!exclusions.has(positionKey(pos))) {
      return pos;
    }
  }

  const free: Position[] = [];
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const pos = { x, y };
      if (!exclusions.has(positionKey(pos))) free.push(pos);
    }
  }
  if (free.length === 0) return null;
  return free[randomInt(0, free.length, random)];
}

export interface Grid {
  width: number;
  height: number;
  random?: RandomSource;
}

export function generateFood(
  snake: readonly Position[],
  obstacles: readonly Position[],
  grid: Grid,
  powerUps: readonly PowerUp[] = [],
): Position | null {
  const occupied = buildOccupiedSet(snake, obstacles, powerUps.map(p => p.position));
  return placeRandom(occupied, grid.width, grid.height, grid.random);
}

/**
 * Tops `existing` up to `maxCount` obstacles in place. Previously placed
 * obstacles are kept. Returns how many were added.
 */
export function generateObstacles(
  snake: readonly Position[],
  food: Position | null,
  existing: Position[],
  maxCount: number,
  grid: Grid,
  powerUps: readonly PowerUp[] = [],
): number {
  const occupied = buildOccupiedSet(
    snake,
    existing,
    food ? [food] : [],
    powerUps.map(p => p.position),
  );

  let added = 0;
  while (existing.length < maxCount) {
    const pos = placeRandom(occupied, grid.width, grid.height, grid.random);
    if (!pos) break;
    existing.push(pos);
    occupied.add(positionKey(pos));
    added++;
  }
  return added;
}

/**
 * With chance `probability`, appends one power-up of a random kind on a free
 * cell. Returns the new power-up, or null when the roll failed or no cell
 * was free.
 */
export function maybeGeneratePowerUp(
  snake: readonly Position[],
  obstacles: readonly Position[],
  food: Position | null,
  existing: PowerUp[],
  probability: number,
  grid: Grid,
): PowerUp | null {
  const random = grid.random ?? Math.random;
  if (random() >= probability) return null;

  const kind = POWER_UP_KINDS[randomInt(0, POWER_UP_KINDS.length, random)];
  const occupied = buildOccupiedSet(
    snake,
    obstacles,
    food ? [food] : [],
    existing.map(p => p.position),
  );
  const position = placeRandom(occupied, grid.width, grid.height, random);
  if (!position) return null;

  const powerUp: PowerUp = { kind, position };
  existing.push(powerUp);
  return powerUp;
}
