import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { runSnakeGame } from './index';
import type { GameTerminal } from './utils';
import type { TerminalSize } from './coords';
import { themes } from '../themes';

function createFakeTerminal(size: TerminalSize = { cols: 80, rows: 24 }) {
  const dataListeners = new Set<(data: string) => void>();
  const resizeListeners = new Set<(size: TerminalSize) => void>();
  const errorListeners = new Set<(error: Error) => void>();
  const writes: string[] = [];

  const subscribe = <T>(listeners: Set<T>, listener: T) => {
    listeners.add(listener);
    return { dispose: () => listeners.delete(listener) };
  };

  const terminal: GameTerminal = {
    write: data => {
      writes.push(data);
    },
    cols: size.cols,
    rows: size.rows,
    onData: listener => subscribe(dataListeners, listener),
    onResize: listener => subscribe(resizeListeners, listener),
    onError: listener => subscribe(errorListeners, listener),
  };

  return {
    terminal,
    writes,
    type: (data: string) => dataListeners.forEach(listener => listener(data)),
    fail: (error: Error) => errorListeners.forEach(listener => listener(error)),
    get listenerCount() {
      return dataListeners.size + resizeListeners.size + errorListeners.size;
    },
  };
}

const options = { theme: themes.classic, random: () => 0, tickIntervalMs: 100 };

describe('runSnakeGame', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('enters the alternate screen and waits for the first tick', async () => {
    const fake = createFakeTerminal();
    const session = runSnakeGame(fake.terminal, options);

    expect(fake.writes).toEqual(['\x1b[?1049h', '\x1b[?25l', '\x1b[2J\x1b[H']);
    expect(session.isRunning).toBe(true);

    session.stop();
    await session.finished;
  });

  it('draws one frame per tick and steers with the arrows', async () => {
    const fake = createFakeTerminal();
    const session = runSnakeGame(fake.terminal, options);

    fake.type('\x1b[C');
    await vi.advanceTimersByTimeAsync(300);

    expect(fake.writes).toHaveLength(3 + 3);
    expect(session.controller.snake.body.head).toEqual({ x: 14, y: 10 });
    expect(fake.writes[fake.writes.length - 1]).toContain('\x1b[13;47H\x1b[31m██');

    session.stop();
    await session.finished;
  });

  it('quits on q and restores the terminal', async () => {
    const fake = createFakeTerminal();
    const session = runSnakeGame(fake.terminal, options);

    fake.type('q');
    await vi.advanceTimersByTimeAsync(100);

    await expect(session.finished).resolves.toEqual({ score: 0, lost: false });
    expect(session.isRunning).toBe(false);
    expect(fake.writes.slice(-2)).toEqual(['\x1b[?1049l', '\x1b[?25h']);
    expect(fake.listenerCount).toBe(0);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('shows the end screen after a crash until the player quits', async () => {
    const fake = createFakeTerminal();
    const session = runSnakeGame(fake.terminal, options);

    fake.type('\x1b[A');
    // Ten moves reach the top row, the eleventh hits the wall
    await vi.advanceTimersByTimeAsync(1100);
    expect(session.controller.lost).toBe(true);
    expect(fake.writes[fake.writes.length - 1]).not.toContain('Your Score');

    await vi.advanceTimersByTimeAsync(200);
    expect(fake.writes[fake.writes.length - 1]).toContain('Your Score: 0');
    expect(session.isRunning).toBe(true);

    fake.type('q');
    await vi.advanceTimersByTimeAsync(100);
    await expect(session.finished).resolves.toEqual({ score: 0, lost: true });
  });

  it('stops on request without waiting for a tick', async () => {
    const fake = createFakeTerminal();
    const session = runSnakeGame(fake.terminal, options);

    session.stop();
    session.stop();

    await expect(session.finished).resolves.toEqual({ score: 0, lost: false });
    expect(fake.writes.slice(-2)).toEqual(['\x1b[?1049l', '\x1b[?25h']);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('fails fast when the input source faults', async () => {
    const fake = createFakeTerminal();
    const session = runSnakeGame(fake.terminal, options);

    fake.fail(new Error('read EIO'));

    await expect(session.finished).rejects.toThrow('read EIO');
    expect(session.isRunning).toBe(false);
    expect(fake.writes.slice(-2)).toEqual(['\x1b[?1049l', '\x1b[?25h']);
    expect(fake.listenerCount).toBe(0);
  });

  it('handles every key typed between two ticks', async () => {
    const fake = createFakeTerminal();
    const session = runSnakeGame(fake.terminal, options);

    // Up then Left before the tick: only the newest arrow steers
    fake.type('\x1b[A');
    fake.type('\x1b[D');
    await vi.advanceTimersByTimeAsync(100);

    expect(session.controller.snake.body.head).toEqual({ x: 10, y: 10 });
    expect(session.controller.events.size).toBe(0);

    session.stop();
    await session.finished;
  });
});
