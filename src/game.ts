import { config, gridSize, type Config } from "./config.js";
import type {
  Direction, GameEvent, GameOptions, GameState, GameStats, GameStatus,
  OverReason, Position, PowerUp,
} from "./types.js";
import {
  generateFood, generateObstacles, getOppositeDirection, isInBounds,
  maybeGeneratePowerUp, movePosition, obstacleCap, samePosition, type Grid,
} from "./board.js";
import { createSeededRandom } from "./random.js";

const STARTING_LENGTH = 3;

export interface Game {
  step(): void;
  setHeading(direction: Direction): boolean;
  reset(): void;
  loadState(state: GameState): void;

  getState(): GameState;
  getSnake(): Position[];
  getFood(): Position | null;
  getObstacles(): Position[];
  getPowerUps(): PowerUp[];
  getStats(): GameStats;
  getStatus(): GameStatus;
  getHeading(): Direction;
  getTick(): number;

  getOptions(): GameOptions;
  updateOptions(updates: Partial<GameOptions>): void;
  setOnEvent(cb: ((event: GameEvent) => void) | null): void;
}

export function optionsFromConfig(cfg: Config = config): GameOptions {
  return {
    ...gridSize(cfg),
    foodScore: cfg.foodScore,
    bonusScore: cfg.bonusScore,
    pointsPerLevel: cfg.pointsPerLevel,
    baseSpeed: cfg.baseSpeed,
    maxFoodSpeed: cfg.maxFoodSpeed,
    maxSpeed: cfg.maxSpeed,
    speedBoost: cfg.speedBoost,
    invincibleTicks: cfg.invincibleTicks,
    powerUpChance: cfg.powerUpChance,
    obstacleGrowthChance: cfg.obstacleGrowthChance,
    maxObstacles: cfg.maxObstacles,
    random: cfg.seed === undefined ? Math.random : createSeededRandom(cfg.seed),
  };
}

function assertGrid(width: number, height: number) {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
    throw new RangeError(`Grid must be at least 1x1 cells, got ${width}x${height}`);
  }
}

function copyPositions(positions: readonly Position[]): Position[] {
  return positions.map(p => ({ x: p.x, y: p.y }));
}

export function createGame(overrides: Partial<GameOptions> = {}): Game {
  let options: GameOptions = { ...optionsFromConfig(), ...overrides };
  assertGrid(options.gridWidth, options.gridHeight);

  let onEvent: ((event: GameEvent) => void) | null = null;
  let gameState: GameState = createInitialState(0);
  let pendingHeading: Direction = gameState.heading;

  function emitEvent(event: GameEvent) {
    onEvent?.(event);
  }

  function grid(): Grid {
    return { width: gameState.gridWidth, height: gameState.gridHeight, random: options.random };
  }

  function createInitialState(highScore: number): GameState {
    const { gridWidth, gridHeight } = options;
    const head = { x: Math.floor(gridWidth / 2), y: Math.floor(gridHeight / 2) };
    const length = Math.min(STARTING_LENGTH, head.x + 1);
    const snake = Array.from({ length }, (_, i) => ({ x: head.x - i, y: head.y }));

    const startGrid: Grid = { width: gridWidth, height: gridHeight, random: options.random };
    const food = generateFood(snake, [], startGrid);
    const obstacles: Position[] = [];
    generateObstacles(snake, food, obstacles, obstacleCap(gridWidth, gridHeight, options.maxObstacles), startGrid);

    return {
      tick: 0,
      status: "running",
      gridWidth,
      gridHeight,
      snake,
      heading: "RIGHT",
      food,
      obstacles,
      powerUps: [],
      stats: {
        score: 0,
        highScore,
        level: 1,
        speed: options.baseSpeed,
        invincible: false,
        invincibleTicks: 0,
      },
    };
  }

  // --- Tick ---

  function step() {
    if (gameState.status !== "running") return;

    const newHead = movePosition(gameState.snake[0], pendingHeading);

    // Collision order is fixed: wall, obstacle, self
    if (!isInBounds(newHead, gameState.gridWidth, gameState.gridHeight)) {
      endGame("wall");
      return;
    }
    if (!gameState.stats.invincible && gameState.obstacles.some(o => samePosition(o, newHead))) {
      endGame("obstacle");
      return;
    }
    if (gameState.snake.some(p => samePosition(p, newHead))) {
      endGame("self");
      return;
    }

    gameState.tick++;
    gameState.heading = pendingHeading;
    gameState.snake.unshift(newHead);

    if (gameState.food && samePosition(newHead, gameState.food)) {
      eatFood(newHead);
    } else {
      gameState.snake.pop();
    }

    tickInvincibility();
    collectPowerUp(newHead);
    ensureFood();
    growObstacles();
  }

  function eatFood(at: Position) {
    const stats = gameState.stats;
    stats.score += options.foodScore;
    stats.highScore = Math.max(stats.highScore, stats.score);

    gameState.food = generateFood(gameState.snake, gameState.obstacles, grid(), gameState.powerUps);

    stats.speed = Math.min(
      options.baseSpeed + Math.floor(stats.score / options.pointsPerLevel),
      options.maxFoodSpeed,
    );
    emitEvent({ type: "food:eaten", position: at, score: stats.score, length: gameState.snake.length });

    const powerUp = maybeGeneratePowerUp(
      gameState.snake, gameState.obstacles, gameState.food, gameState.powerUps,
      options.powerUpChance, grid(),
    );
    if (powerUp) {
      emitEvent({ type: "powerup:spawned", powerUp });
    }

    if (stats.score >= stats.level * options.pointsPerLevel) {
      stats.level++;
      emitEvent({ type: "level:up", level: stats.level });
    }
  }

  // Retries placement after a full grid; the tail or a collected power-up may have freed a cell
  function ensureFood() {
    if (gameState.food) return;
    gameState.food = generateFood(gameState.snake, gameState.obstacles, grid(), gameState.powerUps);
    if (!gameState.food) {
      emitEvent({ type: "placement:exhausted", entity: "food" });
    }
  }

  function tickInvincibility() {
    const stats = gameState.stats;
    if (stats.invincibleTicks <= 0) return;
    stats.invincibleTicks--;
    if (stats.invincibleTicks === 0) {
      stats.invincible = false;
      emitEvent({ type: "invincibility:ended" });
    }
  }

  function collectPowerUp(at: Position) {
    const index = gameState.powerUps.findIndex(p => samePosition(p.position, at));
    if (index === -1) return;

    const [powerUp] = gameState.powerUps.splice(index, 1);
    applyPowerUp(powerUp);
    emitEvent({ type: "powerup:collected", powerUp });
  }

  function applyPowerUp(powerUp: PowerUp) {
    const stats = gameState.stats;
    switch (powerUp.kind) {
      case "speed":
        stats.speed = Math.min(stats.speed + options.speedBoost, options.maxSpeed);
        return;
      case "invincible":
        stats.invincible = true;
        stats.invincibleTicks = options.invincibleTicks;
        return;
      case "bonus":
        stats.score += options.bonusScore;
        stats.highScore = Math.max(stats.highScore, stats.score);
        return;
      default: {
        const unreachable: never = powerUp.kind;
        throw new Error(`Unknown power-up: ${String(unreachable)}`);
      }
    }
  }

  function growObstacles() {
    if (options.random() >= options.obstacleGrowthChance) return;

    const cap = obstacleCap(gameState.gridWidth, gameState.gridHeight, options.maxObstacles);
    if (gameState.obstacles.length >= cap) return;

    const added = generateObstacles(
      gameState.snake, gameState.food, gameState.obstacles, cap, grid(), gameState.powerUps,
    );
    if (added > 0) {
      emitEvent({ type: "obstacles:grown", count: gameState.obstacles.length });
    }
    if (gameState.obstacles.length < cap) {
      emitEvent({ type: "placement:exhausted", entity: "obstacle" });
    }
  }

  function endGame(reason: OverReason) {
    gameState.status = "over";
    gameState.overReason = reason;
    emitEvent({ type: "game:over", reason, score: gameState.stats.score, tick: gameState.tick });
  }

  // --- Input & control ---

  function setHeading(direction: Direction): boolean {
    if (gameState.status !== "running") return false;
    if (direction === getOppositeDirection(gameState.heading)) return false;
    pendingHeading = direction;
    return true;
  }

  function reset() {
    // Whole record replaced at once, between ticks
    gameState = createInitialState(gameState.stats.highScore);
    pendingHeading = gameState.heading;
    emitEvent({ type: "game:reset" });
    emitEvent({ type: "game:started", gridWidth: gameState.gridWidth, gridHeight: gameState.gridHeight });
  }

  function loadState(saved: GameState) {
    assertGrid(saved.gridWidth, saved.gridHeight);
    if (saved.snake.length === 0) {
      throw new RangeError("Snake must have at least one cell");
    }
    gameState = structuredClone(saved);
    pendingHeading = gameState.heading;
  }

  function updateOptions(updates: Partial<GameOptions>) {
    const next = { ...options, ...updates };
    assertGrid(next.gridWidth, next.gridHeight);
    options = next;
  }

  return {
    step,
    setHeading,
    reset,
    loadState,

    getState: () => structuredClone(gameState),
    getSnake: () => copyPositions(gameState.snake),
    getFood: () => (gameState.food ? { ...gameState.food } : null),
    getObstacles: () => copyPositions(gameState.obstacles),
    getPowerUps: () => gameState.powerUps.map(p => ({ kind: p.kind, position: { ...p.position } })),
    getStats: () => ({ ...gameState.stats }),
    getStatus: () => gameState.status,
    getHeading: () => gameState.heading,
    getTick: () => gameState.tick,

    getOptions: () => ({ ...options }),
    updateOptions,
    setOnEvent: (cb) => {
      onEvent = cb;
    },
  };
}
