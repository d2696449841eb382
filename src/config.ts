import { z } from "zod";

export type Pacing = "fixed" | "speed";

export interface Config {
  port: number;
  host: string;
  logLevel: string;
  width: number;
  height: number;
  cellSize: number;
  tickRate: number;
  pacing: Pacing;
  seed?: number;
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
}

export const config: Config = {
  port: 3000,
  host: "0.0.0.0",
  logLevel: "info",

  // Screen in pixels; the grid is derived from it
  width: 800,
  height: 600,
  cellSize: 20,

  tickRate: 60,             // ticks/second at base speed
  pacing: "fixed",

  foodScore: 10,
  bonusScore: 50,
  pointsPerLevel: 50,
  baseSpeed: 10,
  maxFoodSpeed: 20,         // cap for the score-driven formula
  maxSpeed: 25,             // cap for speed power-ups
  speedBoost: 3,
  invincibleTicks: 300,     // ~5 seconds at 60 ticks/second
  powerUpChance: 0.3,       // rolled each time food is eaten
  obstacleGrowthChance: 0.01, // rolled every tick
  maxObstacles: 20,
};

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).optional(),
  HOST: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),
  WIDTH: z.coerce.number().int().min(1).optional(),
  HEIGHT: z.coerce.number().int().min(1).optional(),
  CELL_SIZE: z.coerce.number().int().min(1).optional(),
  TICK_RATE: z.coerce.number().int().min(1).max(240).optional(),
  PACING: z.enum(["fixed", "speed"]).optional(),
  SEED: z.coerce.number().int().optional(),
});

export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const parsed = EnvSchema.parse(env);
  return {
    ...config,
    port: parsed.PORT ?? config.port,
    host: parsed.HOST ?? config.host,
    logLevel: parsed.LOG_LEVEL ?? config.logLevel,
    width: parsed.WIDTH ?? config.width,
    height: parsed.HEIGHT ?? config.height,
    cellSize: parsed.CELL_SIZE ?? config.cellSize,
    tickRate: parsed.TICK_RATE ?? config.tickRate,
    pacing: parsed.PACING ?? config.pacing,
    seed: parsed.SEED ?? config.seed,
  };
}

export function gridSize(cfg: Pick<Config, "width" | "height" | "cellSize">): { gridWidth: number; gridHeight: number } {
  return {
    gridWidth: Math.floor(cfg.width / cfg.cellSize),
    gridHeight: Math.floor(cfg.height / cfg.cellSize),
  };
}
