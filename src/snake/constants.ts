/**
 * Snake game constants
 *
 * The logical grid is addressed at half the canvas resolution: every cell
 * renders as a 2-column glyph, and the board is drawn a quarter of the
 * canvas height above and below the terminal's centre row.
 */

export const CANVAS_WIDTH = 46;
export const CANVAS_HEIGHT = 46;

export const TICKS_PER_SECOND = 10;
export const TICK_INTERVAL_MS = Math.floor(1000 / TICKS_PER_SECOND);

/** Playable columns, x in [0, GRID_COLS) */
export const GRID_COLS = CANVAS_WIDTH / 2 - 1;
/** Playable rows, y in [0, GRID_ROWS) */
export const GRID_ROWS = CANVAS_HEIGHT / 2 - 2;

export const START_POSITION = {
  x: Math.floor(CANVAS_WIDTH / 4),
  y: Math.floor(CANVAS_HEIGHT / 4) - 1,
} as const;

export const BORDER_STYLE = {
  vertical: '│',
  horizontal: '─',
  topLeft: '╭',
  topRight: '╮',
  bottomLeft: '╰',
  bottomRight: '╯',
} as const;

export const APPLE_KINDS = ['🍎', '🍏'] as const;
export type AppleKind = (typeof APPLE_KINDS)[number];

export const SNAKE_GLYPH = '██';

export const QUIT_KEY = 'q';

export const LOGO = [
  ' ___  _  _    _    _  __ ___ ',
  '/ __|| \\| |  /_\\  | |/ /| __|',
  '\\__ \\| .` | / _ \\ | \' < | _| ',
  '|___/|_|\\_|/_/ \\_\\|_|\\_\\|___|',
];
