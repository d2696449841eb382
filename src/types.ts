export interface Position {
  x: number;
  y: number;
}

export type Direction = "UP" | "DOWN" | "LEFT" | "RIGHT";

export type PowerUpKind = "speed" | "invincible" | "bonus";

export interface PowerUp {
  kind: PowerUpKind;
  position: Position;
}

export type RandomSource = () => number;

export interface GameStats {
  score: number;
  highScore: number;     // best score since the process started
  level: number;
  speed: number;         // tick-rate multiplier, 10..25
  invincible: boolean;
  invincibleTicks: number;
}

export type GameStatus = "running" | "over";

export type OverReason = "wall" | "obstacle" | "self";

export interface GameState {
  tick: number;
  status: GameStatus;
  overReason?: OverReason;
  gridWidth: number;
  gridHeight: number;

  // snake[0] = head
  snake: Position[];
  heading: Direction;

  food: Position | null;   // null only when no free cell is left
  obstacles: Position[];
  powerUps: PowerUp[];

  stats: GameStats;
}

export interface GameOptions {
  gridWidth: number;
  gridHeight: number;
  foodScore: number;
  bonusScore: number;
  pointsPerLevel: number;
  baseSpeed: number;
  maxFoodSpeed: number;
  maxSpeed: number;
  speedBoost: number;
  invincibleTicks: number;
  powerUpChance: number;
  obstacleGrowthChance: number;
  maxObstacles: number;
  random: RandomSource;
}

export type GameEvent =
  | { type: "game:started"; gridWidth: number; gridHeight: number }
  | { type: "food:eaten"; position: Position; score: number; length: number }
  | { type: "level:up"; level: number }
  | { type: "powerup:spawned"; powerUp: PowerUp }
  | { type: "powerup:collected"; powerUp: PowerUp }
  | { type: "invincibility:ended" }
  | { type: "obstacles:grown"; count: number }
  | { type: "placement:exhausted"; entity: "food" | "obstacle" }
  | { type: "game:over"; reason: OverReason; score: number; tick: number }
  | { type: "game:reset" };
