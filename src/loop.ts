import type { Pacing } from "./config.js";
import type { Game } from "./game.js";
import type { GameState } from "./types.js";

export interface LoopOptions {
  tickRate: number;   // ticks/second at base speed
  pacing: Pacing;
  baseSpeed: number;
}

export interface Loop {
  start(): void;
  pause(): void;
  stop(): void;
  isRunning(): boolean;
  intervalMs(): number;
  updateOptions(updates: Partial<LoopOptions>): void;
  getOptions(): LoopOptions;
  setOnTick(cb: ((state: GameState) => void) | null): void;
}

/**
 * Milliseconds between ticks. Under "speed" pacing the score-driven speed
 * scales the rate: speed 20 runs twice as fast as the base speed of 10.
 */
export function tickIntervalMs(options: LoopOptions, speed: number): number {
  const rate = options.pacing === "speed"
    ? options.tickRate * (speed / options.baseSpeed)
    : options.tickRate;
  return 1000 / rate;
}

export function createLoop(game: Game, initial: LoopOptions): Loop {
  let options: LoopOptions = { ...initial };
  let tickTimer: ReturnType<typeof setTimeout> | null = null;
  let running = false;
  let onTick: ((state: GameState) => void) | null = null;

  function intervalMs(): number {
    return tickIntervalMs(options, game.getStats().speed);
  }

  function executeTick() {
    tickTimer = null;
    if (!running) return;
    game.step();
    onTick?.(game.getState());
    scheduleTick();
  }

  function scheduleTick() {
    if (tickTimer) clearTimeout(tickTimer);
    if (!running) return;
    tickTimer = setTimeout(executeTick, intervalMs());
  }

  function start() {
    if (running) return;
    running = true;
    scheduleTick();
  }

  function stop() {
    running = false;
    if (tickTimer) {
      clearTimeout(tickTimer);
      tickTimer = null;
    }
  }

  function updateOptions(updates: Partial<LoopOptions>) {
    options = { ...options, ...updates };
    if (running) scheduleTick();
  }

  return {
    start,
    pause: stop,
    stop,
    isRunning: () => running,
    intervalMs,
    updateOptions,
    getOptions: () => ({ ...options }),
    setOnTick: (cb) => {
      onTick = cb;
    },
  };
}
