import { createScopedLogger, errorMessage } from "../shared/index.js";
import type { EngineConfiguration, ScheduleEngine, TickOutcome } from "./engine.js";

const DEFAULT_POLL_INTERVAL_MS = 20_000;
const MIN_POLL_INTERVAL_MS = 1_000;

const log = createScopedLogger("runner");

export interface ScheduleRunnerOptions {
  engine: ScheduleEngine;
  pollIntervalMs?: number;
  now?: () => Date;
  onTick?: (outcome: TickOutcome) => void;
}

export class ScheduleRunner {
  private readonly engine: ScheduleEngine;
  private readonly pollIntervalMs: number;
  private readonly nowProvider: () => Date;
  private readonly onTick?: (outcome: TickOutcome) => void;

  private timer: ReturnType<typeof setInterval> | null = null;
  private running = false;

  constructor(options: ScheduleRunnerOptions) {
    this.engine = options.engine;
    this.pollIntervalMs = Math.max(MIN_POLL_INTERVAL_MS, options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS);
    this.nowProvider = options.now ?? (() => new Date());
    this.onTick = options.onTick;
  }

  get intervalMs(): number {
    return this.pollIntervalMs;
  }

  get isStarted(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.tick();
    }, this.pollIntervalMs);
    this.tick();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * Replaces the engine's configuration with whatever `load` builds. On
   * failure the previous configuration stays in effect.
   */
  async reload(load: () => Promise<EngineConfiguration>): Promise<boolean> {
    let next: EngineConfiguration;
    try {
      next = await load();
    } catch (err) {
      log.error("reload failed, keeping previous configuration:", errorMessage(err));
      return false;
    }
    this.engine.reconfigure(next);
    log.info("configuration reloaded");
    return true;
  }

  private tick(): void {
    if (this.running) return;
    this.running = true;

    try {
      const outcome = this.engine.tick(this.nowProvider());
      this.onTick?.(outcome);
    } catch (err) {
      log.warn("tick failed:", errorMessage(err));
    } finally {
      this.running = false;
    }
  }
}
