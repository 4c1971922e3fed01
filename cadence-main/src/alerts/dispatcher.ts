import { AlertDeliveryError, createScopedLogger, errorMessage } from "../shared/index.js";
import type { AlertChannel } from "./types.js";

const log = createScopedLogger("alerts");

export type AlertJob = (channel: AlertChannel) => Promise<void>;

/**
 * Runs alert jobs detached from the caller. A failing job is logged and
 * then treated as done.
 */
export class AlertDispatcher {
  private readonly channel: AlertChannel;
  private readonly running = new Set<Promise<void>>();

  constructor(channel: AlertChannel) {
    this.channel = channel;
  }

  get inFlight(): number {
    return this.running.size;
  }

  enqueue(label: string, job: AlertJob): void {
    const channel = this.channel;
    const run = (async () => {
      try {
        await job(channel);
      } catch (err) {
        if (err instanceof AlertDeliveryError) {
          log.warn(`${label}: ${err.message}`);
        } else {
          log.error(`${label} failed:`, errorMessage(err));
        }
      }
    })();

    this.running.add(run);
    void run.then(() => {
      this.running.delete(run);
    });
  }

  alert(label: string, title: string, message: string): void {
    this.enqueue(label, async (target) => {
      const outcome = await target.alert(title, message);
      if (outcome === "timedOut") {
        log.info(`${label}: not acknowledged before timeout`);
      }
    });
  }

  /** Resolves once every job enqueued so far, and any they enqueue, has finished. */
  async onIdle(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all([...this.running]);
    }
  }
}
