import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import type { Server } from "socket.io";
import fastifyCors from "@fastify/cors";
import fastifySwagger from "@fastify/swagger";
import fastifySwaggerUi from "@fastify/swagger-ui";
import { jsonSchemaTransform } from "fastify-type-provider-zod";
import { registerRoutes } from "./routes.js";
import type { Game } from "./game.js";
import type { Loop } from "./loop.js";
import type { GameEvent } from "./types.js";

export interface AppOptions {
  game: Game;
  loop: Loop;
  logger?: FastifyServerOptions["logger"];
}

export async function buildApp({ game, loop, logger = true }: AppOptions) {
  const app = Fastify({ logger });

  await app.register(fastifyCors, { origin: true });

  await app.register(fastifySwagger, {
    openapi: {
      info: {
        title: "Snake Game Server",
        description: "Single-player grid snake: steer over HTTP or socket.io, watch the state stream",
        version: "1.0.0",
      },
      tags: [
        { name: "player", description: "Steering and game state" },
        { name: "admin", description: "Loop and configuration control" },
      ],
    },
    transform: jsonSchemaTransform,
  });

  await app.register(fastifySwaggerUi, {
    routePrefix: "/docs",
  });

  await registerRoutes(app, { game, loop });

  return app;
}

export interface CloseTargets {
  app: FastifyInstance;
  io: Pick<Server, "disconnectSockets" | "close">;
  loop: Loop;
}

export async function closeServer({ app, io, loop }: CloseTargets) {
  loop.stop();
  io.disconnectSockets(true);
  await app.close();
  // Fastify has already closed the HTTP server; this shuts the engine down
  await io.close();
}

type LogFn = (obj: object, msg: string) => void;

export function logGameEvent(log: { info: LogFn; debug: LogFn; warn: LogFn }, event: GameEvent) {
  switch (event.type) {
    case "placement:exhausted":
      log.warn(event, `No free cell left for ${event.entity}`);
      return;
    case "powerup:spawned":
    case "powerup:collected":
    case "food:eaten":
    case "obstacles:grown":
    case "invincibility:ended":
      log.debug(event, event.type);
      return;
    default:
      log.info(event, event.type);
  }
}
