/**
 * xterm.js adapter
 *
 * Lets the game run inside a browser terminal:
 *   const session = runSnakeGame(fromXterm(terminal));
 */

import type { Terminal } from '@xterm/xterm';
import type { GameTerminal } from './utils';

export type XtermLike = Pick<Terminal, 'write' | 'cols' | 'rows' | 'onData' | 'onResize'>;

export function fromXterm(terminal: XtermLike): GameTerminal {
  return {
    write: data => terminal.write(data),
    get cols() {
      return terminal.cols;
    },
    get rows() {
      return terminal.rows;
    },
    onData: listener => terminal.onData(data => listener(data)),
    onResize: listener => terminal.onResize(size => listener({ cols: size.cols, rows: size.rows })),
  };
}
