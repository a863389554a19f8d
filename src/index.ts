/**
 * tty-snake
 *
 * Real-time Snake for the terminal.
 *
 * Library usage (xterm.js):
 *   import { runSnakeGame, fromXterm, setTheme } from 'tty-snake';
 *   setTheme('cyan');
 *   const session = runSnakeGame(fromXterm(terminal));
 *   session.finished.then(({ score }) => console.log(score));
 *
 * CLI usage:
 *   npx tty-snake
 */

export {
  runSnakeGame,
  type SnakeGameOptions,
  type SnakeSession,
  type GameResult,
} from './snake';

export { fromXterm, type XtermLike } from './snake/xterm';

// Terminal contract and theme state
export {
  setTheme,
  getTheme,
  getCurrentTheme,
  enterAlternateBuffer,
  exitAlternateBuffer,
  isInAlternateBuffer,
  type GameTerminal,
} from './snake/utils';

export type { ThemeName, SnakeTheme } from './themes';

// Engine, for custom loops and front ends
export {
  createController,
  createSnake,
  tick,
  handleEvents,
  advanceGame,
  spawnApple,
  type Controller,
  type Snake,
  type Apple,
  type Direction,
  type RandomSource,
} from './snake/engine';

export { SnakeBody } from './snake/snakeBody';
export { EventQueue } from './snake/eventQueue';
export { RendezvousChannel } from './snake/channel';
export { TickScheduler, type Tick } from './snake/scheduler';
export { InputCapture } from './snake/inputCapture';
export { parseInput, describeEvent, type InputEvent } from './snake/input';
export { renderFrame, renderEndScreen, type RenderOptions } from './snake/render';

export {
  toDisplay,
  getCanvasBounds,
  type Position,
  type DisplayPosition,
  type TerminalSize,
} from './snake/coords';

export {
  CANVAS_WIDTH,
  CANVAS_HEIGHT,
  GRID_COLS,
  GRID_ROWS,
  TICKS_PER_SECOND,
  APPLE_KINDS,
  type AppleKind,
} from './snake/constants';
