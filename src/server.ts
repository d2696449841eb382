import { Server } from "socket.io";
import { loadConfig } from "./config.js";
import { createGame, optionsFromConfig } from "./game.js";
import { createLoop } from "./loop.js";
import { buildApp, closeServer, logGameEvent } from "./app.js";
import { DirectionSchema } from "./schemas.js";

const cfg = loadConfig();

const game = createGame(optionsFromConfig(cfg));
const loop = createLoop(game, {
  tickRate: cfg.tickRate,
  pacing: cfg.pacing,
  baseSpeed: cfg.baseSpeed,
});

const app = await buildApp({ game, loop, logger: { level: cfg.logLevel } });

// Start HTTP server
await app.listen({ port: cfg.port, host: cfg.host });

// Socket.io on top of Fastify's underlying HTTP server
const io = new Server(app.server, {
  cors: { origin: "*" },
});

let viewerCount = 0;

io.on("connection", (socket) => {
  viewerCount++;
  app.log.info(`Viewer connected (${viewerCount} total)`);

  // Send current state immediately
  socket.emit("game:tick", game.getState());

  socket.on("heading", (payload: unknown) => {
    const parsed = DirectionSchema.safeParse(payload);
    if (!parsed.success) {
      app.log.warn({ payload }, "Ignoring invalid heading message");
      return;
    }
    game.setHeading(parsed.data);
  });

  socket.on("reset", () => {
    if (game.getStatus() !== "over") return;
    game.reset();
  });

  socket.on("disconnect", () => {
    viewerCount--;
    app.log.info(`Viewer disconnected (${viewerCount} total)`);
  });
});

// Wire game events to the log and to Socket.io
loop.setOnTick((state) => {
  io.emit("game:tick", state);
});

game.setOnEvent((event) => {
  logGameEvent(app.log, event);
  io.emit(event.type, event);
});

loop.start();

const shutdown = async (signal: string) => {
  app.log.info(`${signal} received, shutting down`);
  await closeServer({ app, io, loop });
};
for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      app.log.error(err, "Shutdown failed");
      process.exitCode = 1;
    });
  });
}

app.log.info(`Grid ${game.getState().gridWidth}x${game.getState().gridHeight}, ${cfg.tickRate} ticks/s (${cfg.pacing} pacing)`);
app.log.info(`API docs: http://localhost:${cfg.port}/docs`);
