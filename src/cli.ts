/**
 * CLI entry point for tty-snake
 *
 * Provides a Node.js terminal adapter that maps stdin/stdout to the game's
 * terminal contract, then runs one game and prints the score.
 */

import type { IDisposable } from '@xterm/xterm';
import { CliUsageError, helpText, parseCliArgs, type CliOptions } from './args';
import { runSnakeGame, setTheme, type GameTerminal, type TerminalSize } from './index';
import { getThemeColors, getThemeNames } from './themes';

// ---------------------------------------------------------------------------
// Node Terminal Adapter
// ---------------------------------------------------------------------------

interface NodeTerminal extends GameTerminal {
  onError(listener: (error: Error) => void): IDisposable;
  /** Put the terminal back the way we found it. Idempotent. */
  restore(): void;
}

// SGR mouse reports: button presses, drags, extended coordinates
const MOUSE_ON = '\x1b[?1000h\x1b[?1002h\x1b[?1006h';
const MOUSE_OFF = '\x1b[?1006l\x1b[?1002l\x1b[?1000l';

// Synchronized output: wrap writes with DEC sync sequences so the
// terminal batches clear + redraw into a single atomic paint.
const SYNC_START = '\x1b[?2026h';
const SYNC_END = '\x1b[?2026l';

function addListener<T>(listeners: T[], listener: T): IDisposable {
  listeners.push(listener);
  return {
    dispose: () => {
      const idx = listeners.indexOf(listener);
      if (idx !== -1) listeners.splice(idx, 1);
    },
  };
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function createNodeTerminal(options: { mouse: boolean }): NodeTerminal {
  const dataListeners: ((data: string) => void)[] = [];
  const resizeListeners: ((size: TerminalSize) => void)[] = [];
  const errorListeners: ((error: Error) => void)[] = [];

  const fail = (error: Error) => {
    for (const listener of [...errorListeners]) {
      listener(error);
    }
  };

  if (process.stdin.isTTY) {
    process.stdin.setRawMode(true);
  }
  process.stdin.resume();
  process.stdin.setEncoding('utf8');

  process.stdin.on('data', (data: string) => {
    for (const listener of [...dataListeners]) {
      listener(data);
    }
  });
  process.stdin.on('error', fail);
  process.stdin.on('end', () => fail(new Error('stdin closed')));
  process.stdout.on('error', fail);

  process.stdout.on('resize', () => {
    const size = { cols: process.stdout.columns || 80, rows: process.stdout.rows || 24 };
    for (const listener of [...resizeListeners]) {
      listener(size);
    }
  });

  if (options.mouse) {
    process.stdout.write(MOUSE_ON);
  }

  let restored = false;

  return {
    write: (data: string) => {
      process.stdout.write(SYNC_START + data + SYNC_END);
    },
    get cols() { return process.stdout.columns || 80; },
    get rows() { return process.stdout.rows || 24; },
    onData: listener => addListener(dataListeners, listener),
    onResize: listener => addListener(resizeListeners, listener),
    onError: listener => addListener(errorListeners, listener),
    restore: () => {
      if (restored) return;
      restored = true;
      if (options.mouse) {
        process.stdout.write(MOUSE_OFF);
      }
      process.stdout.write('\x1b[?1049l');
      process.stdout.write('\x1b[?25h');
      process.stdout.write('\x1b[0m');
      if (process.stdin.isTTY) {
        process.stdin.setRawMode(false);
      }
      process.stdin.pause();
    },
  };
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

function readOptions(): CliOptions {
  try {
    return parseCliArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(`[tty-snake] ${error.message}`);
      console.error(helpText());
      process.exit(1);
    }
    throw error;
  }
}

function main() {
  const options = readOptions();

  if (options.help) {
    console.log(helpText());
    return;
  }

  if (options.listThemes) {
    for (const name of getThemeNames()) {
      console.log(`  ${name.padEnd(10)} ${getThemeColors(name).name}`);
    }
    return;
  }

  if (!process.stdin.isTTY || !process.stdout.isTTY) {
    console.error('[tty-snake] Needs an interactive terminal');
    process.exitCode = 1;
    return;
  }

  setTheme(options.theme);
  const terminal = createNodeTerminal({ mouse: options.mouse });

  const fatal = (error: unknown) => {
    terminal.restore();
    console.error(`[tty-snake] ${toError(error).message}`);
    process.exit(1);
  };

  process.on('exit', terminal.restore);
  process.on('uncaughtException', fatal);
  process.on('unhandledRejection', fatal);

  const session = runSnakeGame(terminal, { debug: options.debug });

  process.on('SIGINT', session.stop);
  process.on('SIGTERM', session.stop);

  session.finished
    .then(result => {
      terminal.restore();
      console.log(`Your Score: ${result.score}`);
      process.exit(0);
    })
    .catch(fatal);
}

main();
