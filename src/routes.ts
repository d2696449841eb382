import type { FastifyInstance } from "fastify";
import {
  serializerCompiler,
  validatorCompiler,
  type ZodTypeProvider,
} from "fastify-type-provider-zod";
import {
  HeadingSchema,
  ResetSchema,
  AdminConfigSchema,
  GameStateResponseSchema,
} from "./schemas.js";
import type { Game } from "./game.js";
import type { Loop } from "./loop.js";

export interface RouteDeps {
  game: Game;
  loop: Loop;
}

export async function registerRoutes(app: FastifyInstance, { game, loop }: RouteDeps) {
  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  const typedApp = app.withTypeProvider<ZodTypeProvider>();

  // --- Player routes ---

  typedApp.post("/api/heading", {
    schema: {
      description: "Request a heading change. Applied on the next tick; a 180° reversal is ignored.",
      tags: ["player"],
      body: HeadingSchema,
    },
  }, async (request) => {
    const accepted = game.setHeading(request.body.direction);
    return { accepted, heading: game.getHeading() };
  });

  typedApp.post("/api/reset", {
    schema: {
      description: "Start a fresh game. Only allowed once the game is over unless force is set.",
      tags: ["player"],
      body: ResetSchema,
    },
  }, async (request, reply) => {
    const force = request.body?.force ?? false;
    if (game.getStatus() === "running" && !force) {
      return reply.status(409).send({ error: "Game is still running" });
    }
    game.reset();
    return reply.send({ status: "reset" });
  });

  typedApp.get("/api/state", {
    schema: {
      description: "Get the current game state",
      tags: ["player"],
      response: { 200: GameStateResponseSchema },
    },
  }, async () => {
    return { ...game.getState(), loopRunning: loop.isRunning() };
  });

  // --- Admin routes ---

  app.post("/api/admin/start", {
    schema: {
      description: "Start the tick loop",
      tags: ["admin"],
    },
  }, async () => {
    loop.start();
    return { status: "started" };
  });

  app.post("/api/admin/pause", {
    schema: {
      description: "Pause the tick loop",
      tags: ["admin"],
    },
  }, async () => {
    loop.pause();
    return { status: "paused" };
  });

  typedApp.post("/api/admin/config", {
    schema: {
      description: "Update game configuration (tick rate, pacing, chances, grid size for the next game)",
      tags: ["admin"],
      body: AdminConfigSchema,
    },
  }, async (request) => {
    const { tickRate, pacing, ...gameUpdates } = request.body;
    game.updateOptions(gameUpdates);
    if (tickRate !== undefined) loop.updateOptions({ tickRate });
    if (pacing !== undefined) loop.updateOptions({ pacing });

    const { random, ...options } = game.getOptions();
    return { status: "updated", config: { ...options, ...loop.getOptions() } };
  });
}
