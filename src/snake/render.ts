/**
 * Frame rendering
 *
 * Builds each frame as one string of ANSI escapes so the terminal receives
 * it in a single write. Reads the controller, never changes it.
 */

import { ANSI_RESET, type SnakeTheme } from '../themes';
import { BORDER_STYLE, CANVAS_WIDTH, LOGO, SNAKE_GLYPH } from './constants';
import { type TerminalSize, getCanvasBounds, moveTo, toDisplay } from './coords';
import type { Controller } from './engine';
import { describeEvent } from './input';

export interface RenderOptions {
  theme: SnakeTheme;
  /** Show the last observed event under the board */
  debug?: boolean;
}

const CLEAR = '\x1b[2J\x1b[H';
const DIM = '\x1b[2m';

function centerColumn(size: TerminalSize, width: number): number {
  return Math.max(0, Math.floor(size.cols / 2) - Math.floor(width / 2));
}

export function renderBorder(size: TerminalSize, theme: SnakeTheme): string {
  const { left, right, top, bottom } = getCanvasBounds(size);
  let output = theme.border;

  for (let row = top; row <= bottom; row++) {
    output += `${moveTo(left, row)}${BORDER_STYLE.vertical}${moveTo(right, row)}${BORDER_STYLE.vertical}`;
  }

  const span = BORDER_STYLE.horizontal.repeat(CANVAS_WIDTH - 1);
  output += `${moveTo(left, top)}${BORDER_STYLE.topLeft}${span}${BORDER_STYLE.topRight}`;
  output += `${moveTo(left, bottom)}${BORDER_STYLE.bottomLeft}${span}${BORDER_STYLE.bottomRight}`;

  return output + ANSI_RESET;
}

export function renderSnake(controller: Readonly<Controller>, size: TerminalSize, theme: SnakeTheme): string {
  let output = '';
  for (const cell of controller.snake.body) {
    const { col, row } = toDisplay(cell, size);
    output += `${moveTo(col, row)}${theme.snake}${SNAKE_GLYPH}${ANSI_RESET}`;
  }
  return output;
}

export function renderApple(controller: Readonly<Controller>, size: TerminalSize): string {
  if (!controller.apple) return '';
  const { col, row } = toDisplay(controller.apple.position, size);
  return `${moveTo(col, row)}${controller.apple.kind}`;
}

export function renderLogo(size: TerminalSize, theme: SnakeTheme): string {
  const left = centerColumn(size, LOGO[0].length);
  const top = Math.max(0, Math.floor(size.rows / 2) - 2);
  let output = '';
  LOGO.forEach((line, index) => {
    output += `${moveTo(left, top + index)}${theme.logo}${line}${ANSI_RESET}`;
  });
  return output;
}

function renderTrace(controller: Readonly<Controller>, size: TerminalSize, theme: SnakeTheme): string {
  if (!controller.lastEvent) return '';
  const { left, bottom } = getCanvasBounds(size);
  return `${moveTo(left, bottom + 1)}${theme.text}Got: ${DIM}${describeEvent(controller.lastEvent)}${ANSI_RESET}`;
}

/**
 * One in-game frame: border, snake, apple, then the logo until the first
 * input arrives (or the debug trace after it)
 */
export function renderFrame(controller: Readonly<Controller>, size: TerminalSize, options: RenderOptions): string {
  const { theme } = options;
  let output = CLEAR;
  output += renderBorder(size, theme);
  output += renderSnake(controller, size, theme);
  output += renderApple(controller, size);

  if (!controller.lastEvent) {
    output += renderLogo(size, theme);
  } else if (options.debug) {
    output += renderTrace(controller, size, theme);
  }

  return output;
}

/**
 * Game over: logo and final score
 */
export function renderEndScreen(controller: Readonly<Controller>, size: TerminalSize, options: RenderOptions): string {
  const { theme } = options;
  const message = `Your Score: ${controller.score}`;
  const row = Math.floor(size.rows / 2) + 5;

  let output = CLEAR;
  output += renderLogo(size, theme);
  output += `${moveTo(centerColumn(size, message.length), row)}${theme.text}${message}${ANSI_RESET}`;
  return output;
}
