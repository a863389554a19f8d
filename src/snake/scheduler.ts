/**
 * Fixed-rate tick source
 *
 * Sleeps one tick interval, then offers a tick on a rendezvous channel. The
 * offer only lands if the game loop is already waiting, so a slow frame makes
 * the scheduler drop ticks instead of building a backlog the loop would later
 * burn through in a burst.
 */

import type { RendezvousChannel } from './channel';
import { TICK_INTERVAL_MS } from './constants';
import { sleep } from './utils';

/** Sequence number of a tick, starting at 1 */
export type Tick = number;

export interface TickSchedulerOptions {
  intervalMs?: number;
}

export class TickScheduler {
  private readonly intervalMs: number;
  private readonly abort = new AbortController();
  private task: Promise<void> | null = null;
  private sequence = 0;

  /** Ticks a waiting receiver accepted */
  delivered = 0;
  /** Ticks offered while nobody was waiting */
  dropped = 0;

  constructor(
    private readonly channel: RendezvousChannel<Tick>,
    options: TickSchedulerOptions = {}
  ) {
    this.intervalMs = options.intervalMs ?? TICK_INTERVAL_MS;
  }

  start(): void {
    if (this.task) return;
    this.task = this.run(this.abort.signal);
  }

  /**
   * Ask the loop to exit; an in-progress sleep ends immediately
   */
  stop(): void {
    this.abort.abort();
  }

  /**
   * Resolves once the loop has exited
   */
  join(): Promise<void> {
    return this.task ?? Promise.resolve();
  }

  get isRunning(): boolean {
    return this.task !== null && !this.abort.signal.aborted;
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await sleep(this.intervalMs, signal);
      if (signal.aborted) break;

      this.sequence++;
      if (this.channel.trySend(this.sequence)) {
        this.delivered++;
      } else {
        this.dropped++;
      }
    }
  }
}
