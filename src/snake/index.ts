/**
 * Snake Game
 *
 * Wires input capture, the tick scheduler, the engine and the renderer to a
 * terminal. Each tick: drain input, advance, draw; once the game is lost the
 * end screen stays up until the player quits.
 */

import type { SnakeTheme } from '../themes';
import { RendezvousChannel } from './channel';
import { type Controller, type RandomSource, createController, advanceGame, handleEvents } from './engine';
import { InputCapture } from './inputCapture';
import { renderEndScreen, renderFrame } from './render';
import { type Tick, TickScheduler } from './scheduler';
import { type GameTerminal, enterAlternateBuffer, exitAlternateBuffer, getCurrentTheme } from './utils';

export interface SnakeGameOptions {
  /** Defaults to the theme set with setTheme() */
  theme?: SnakeTheme;
  /** Show the last observed input event under the board */
  debug?: boolean;
  random?: RandomSource;
  /** Override the tick interval (tests, demos) */
  tickIntervalMs?: number;
}

export interface GameResult {
  score: number;
  lost: boolean;
}

/**
 * Snake game session
 */
export interface SnakeSession {
  stop: () => void;
  readonly isRunning: boolean;
  /** Settles after shutdown; rejects if the input source failed */
  readonly finished: Promise<GameResult>;
  /** Live game state, for embedding apps that show their own HUD */
  readonly controller: Readonly<Controller>;
}

export function runSnakeGame(terminal: GameTerminal, options: SnakeGameOptions = {}): SnakeSession {
  const theme = options.theme ?? getCurrentTheme();
  const random = options.random ?? Math.random;
  const renderOptions = { theme, debug: options.debug ?? false };

  const controller = createController();
  const ticks = new RendezvousChannel<Tick>();
  const scheduler = new TickScheduler(ticks, { intervalMs: options.tickIntervalMs });
  const capture = new InputCapture(terminal, controller.events, {
    // Fail fast: end the loop now rather than at the next quit
    onFault: () => ticks.close(),
  });

  let running = true;

  async function loop(): Promise<GameResult> {
    enterAlternateBuffer(terminal, 'snake');
    capture.start();
    scheduler.start();

    try {
      for await (const _tick of ticks) {
        handleEvents(controller);
        const size = { cols: terminal.cols, rows: terminal.rows };

        if (!controller.lost) {
          advanceGame(controller, random);
          terminal.write(renderFrame(controller, size, renderOptions));
        } else {
          terminal.write(renderEndScreen(controller, size, renderOptions));
        }

        if (controller.closeRequested) break;
      }
    } finally {
      running = false;
      scheduler.stop();
      ticks.close();
      try {
        await scheduler.join();
        await capture.join();
      } finally {
        exitAlternateBuffer(terminal, 'snake');
      }
    }

    return { score: controller.score, lost: controller.lost };
  }

  const finished = loop();

  return {
    stop: () => {
      if (!running) return;
      running = false;
      ticks.close();
    },
    get isRunning() {
      return running;
    },
    finished,
    controller,
  };
}
