/**
 * Input capture
 *
 * Listens to the terminal's raw input and resize notifications and appends
 * the parsed events to the shared queue. It never touches game state; the
 * game loop drains the queue on its own schedule.
 *
 * An escape sequence cut off at the end of a read is held back and joined
 * with the next read. If nothing follows within ESCAPE_TIMEOUT_MS it is
 * parsed on its own, so a lone ESC still arrives as Escape.
 */

import type { IDisposable } from '@xterm/xterm';
import type { EventQueue } from './eventQueue';
import { type InputEvent, incompleteEscapeLength, parseInput } from './input';
import type { GameTerminal } from './utils';

export const ESCAPE_TIMEOUT_MS = 50;

export interface InputCaptureOptions {
  /** Called once, as soon as the input source fails */
  onFault?: (error: Error) => void;
}

export class InputCapture {
  private subscriptions: IDisposable[] = [];
  private started = false;
  private fault: Error | null = null;
  private pending = '';
  private flushTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(
    private readonly source: Pick<GameTerminal, 'onData' | 'onResize' | 'onError'>,
    private readonly queue: EventQueue<InputEvent>,
    private readonly options: InputCaptureOptions = {}
  ) {}

  start(): void {
    if (this.started) return;
    this.started = true;

    this.subscriptions.push(
      this.source.onData(data => this.receive(data)),
      this.source.onResize(({ cols, rows }) => {
        this.queue.push({ kind: 'resize', cols, rows });
      })
    );

    if (this.source.onError) {
      this.subscriptions.push(this.source.onError(error => this.fail(error)));
    }
  }

  /**
   * Unsubscribe from the source. Safe to call more than once.
   */
  stop(): void {
    this.clearFlushTimer();
    this.pending = '';
    const subscriptions = this.subscriptions;
    this.subscriptions = [];
    for (const subscription of subscriptions) {
      subscription.dispose();
    }
  }

  /**
   * Stop, then report how capture ended: rejects with the source's fault
   * if there was one
   */
  async join(): Promise<void> {
    this.stop();
    if (this.fault) throw this.fault;
  }

  get isCapturing(): boolean {
    return this.subscriptions.length > 0;
  }

  private receive(data: string): void {
    this.clearFlushTimer();
    const input = this.pending + data;
    const complete = input.length - incompleteEscapeLength(input);
    this.pending = input.slice(complete);
    this.enqueue(input.slice(0, complete));

    if (this.pending) {
      this.flushTimer = setTimeout(() => this.flush(), ESCAPE_TIMEOUT_MS);
    }
  }

  private flush(): void {
    this.flushTimer = null;
    const pending = this.pending;
    this.pending = '';
    this.enqueue(pending);
  }

  private enqueue(data: string): void {
    for (const event of parseInput(data)) {
      if (event.kind !== 'unknown') {
        this.queue.push(event);
      }
    }
  }

  private clearFlushTimer(): void {
    if (this.flushTimer) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }
  }

  private fail(error: Error): void {
    if (this.fault) return;
    this.fault = error;
    this.stop();
    this.options.onFault?.(error);
  }
}
