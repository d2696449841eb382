import { z } from "zod";
import { OBSTACLE_LIMIT } from "./board.js";

export const DirectionSchema = z.enum(["UP", "DOWN", "LEFT", "RIGHT"]);

export const PositionSchema = z.object({
  x: z.number().int(),
  y: z.number().int(),
});

export const HeadingSchema = z.object({
  direction: DirectionSchema,
});

export const ResetSchema = z.object({
  force: z.boolean().optional(),
}).optional();

export const AdminConfigSchema = z.object({
  tickRate: z.number().int().min(1).max(240).optional(),
  pacing: z.enum(["fixed", "speed"]).optional(),
  // Grid size takes effect on the next reset
  gridWidth: z.number().int().min(1).max(200).optional(),
  gridHeight: z.number().int().min(1).max(200).optional(),
  powerUpChance: z.number().min(0).max(1).optional(),
  obstacleGrowthChance: z.number().min(0).max(1).optional(),
  invincibleTicks: z.number().int().min(1).max(6000).optional(),
  maxObstacles: z.number().int().min(0).max(OBSTACLE_LIMIT).optional(),
});

export const PowerUpSchema = z.object({
  kind: z.enum(["speed", "invincible", "bonus"]),
  position: PositionSchema,
});

export const GameStatsSchema = z.object({
  score: z.number(),
  highScore: z.number(),
  level: z.number(),
  speed: z.number(),
  invincible: z.boolean(),
  invincibleTicks: z.number(),
});

export const GameStateResponseSchema = z.object({
  tick: z.number(),
  status: z.enum(["running", "over"]),
  overReason: z.enum(["wall", "obstacle", "self"]).optional(),
  gridWidth: z.number(),
  gridHeight: z.number(),
  snake: z.array(PositionSchema),
  heading: DirectionSchema,
  food: PositionSchema.nullable(),
  obstacles: z.array(PositionSchema),
  powerUps: z.array(PowerUpSchema),
  stats: GameStatsSchema,
  loopRunning: z.boolean(),
});

export const ErrorResponseSchema = z.object({
  error: z.string(),
});
