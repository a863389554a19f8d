/**
 * Logical grid → terminal cell mapping
 *
 * Terminal size can change between frames, so nothing here is cached:
 * callers pass the current size every time.
 */

import { CANVAS_HEIGHT, CANVAS_WIDTH } from './constants';

export interface Position {
  readonly x: number;
  readonly y: number;
}

/** Zero-based terminal character cell */
export interface DisplayPosition {
  readonly col: number;
  readonly row: number;
}

export interface TerminalSize {
  readonly cols: number;
  readonly rows: number;
}

export interface CanvasBounds {
  left: number;
  right: number;
  top: number;
  bottom: number;
}

function saturatingSub(a: number, b: number): number {
  return Math.max(0, a - b);
}

export function samePosition(a: Position, b: Position): boolean {
  return a.x === b.x && a.y === b.y;
}

/**
 * Map a logical cell to the terminal cell its glyph starts at.
 * Offsets saturate at zero so the board stays visible on small terminals.
 */
export function toDisplay(pos: Position, size: TerminalSize): DisplayPosition {
  return {
    col: saturatingSub(Math.floor(size.cols / 2), Math.floor(CANVAS_WIDTH / 2)) + pos.x * 2 + 1,
    row: saturatingSub(Math.floor(size.rows / 2), Math.floor(CANVAS_HEIGHT / 4)) + pos.y + 1,
  };
}

/**
 * Border rectangle around the playfield, inclusive on all sides
 */
export function getCanvasBounds(size: TerminalSize): CanvasBounds {
  const centerX = Math.floor(size.cols / 2);
  const centerY = Math.floor(size.rows / 2);
  return {
    left: saturatingSub(centerX, Math.floor(CANVAS_WIDTH / 2)),
    right: centerX + Math.floor(CANVAS_WIDTH / 2),
    top: saturatingSub(centerY, Math.floor(CANVAS_HEIGHT / 4)),
    bottom: centerY + Math.floor(CANVAS_HEIGHT / 4),
  };
}

/**
 * ANSI cursor move for a zero-based cell (CUP is one-based)
 */
export function moveTo(col: number, row: number): string {
  return `\x1b[${row + 1};${col + 1}H`;
}
