import { describe, it, expect } from 'vitest';
import { renderBorder, renderFrame, renderEndScreen, renderLogo, renderSnake, renderApple } from './render';
import { createController, createSnake } from './engine';
import { keyEvent } from './input';
import { LOGO } from './constants';
import { ANSI_RESET, themes } from '../themes';

const theme = themes.classic;
const size = { cols: 80, rows: 24 };

describe('renderBorder', () => {
  const border = renderBorder(size, theme);

  it('draws the top and bottom edges with corners', () => {
    const span = '─'.repeat(45);
    expect(border).toContain(`\x1b[2;18H╭${span}╮`);
    expect(border).toContain(`\x1b[24;18H╰${span}╯`);
  });

  it('draws both sides on every row', () => {
    expect(border).toContain('\x1b[13;18H│\x1b[13;64H│');
    expect(border.match(/│/g)).toHaveLength(2 * 23);
  });

  it('is wrapped in the border color', () => {
    expect(border.startsWith(theme.border)).toBe(true);
    expect(border.endsWith(ANSI_RESET)).toBe(true);
  });
});

describe('renderSnake', () => {
  it('draws every segment as a two-column block', () => {
    const controller = createController();
    controller.snake = createSnake([{ x: 11, y: 10 }, { x: 10, y: 10 }]);
    expect(renderSnake(controller, size, theme)).toBe(
      `\x1b[13;41H\x1b[31m██${ANSI_RESET}\x1b[13;39H\x1b[31m██${ANSI_RESET}`
    );
  });
});

describe('renderApple', () => {
  it('draws the apple glyph at its mapped cell', () => {
    const controller = createController();
    controller.apple = { position: { x: 0, y: 0 }, kind: '🍏' };
    expect(renderApple(controller, size)).toBe('\x1b[3;19H🍏');
  });

  it('draws nothing without an apple', () => {
    expect(renderApple(createController(), size)).toBe('');
  });
});

describe('renderLogo', () => {
  it('centres the banner two rows above the middle', () => {
    const left = 40 - Math.floor(LOGO[0].length / 2);
    const logo = renderLogo(size, theme);
    expect(logo).toContain(`\x1b[11;${left + 1}H${theme.logo}${LOGO[0]}${ANSI_RESET}`);
    expect(logo).toContain(`\x1b[14;${left + 1}H${theme.logo}${LOGO[3]}${ANSI_RESET}`);
  });
});

describe('renderFrame', () => {
  it('clears, then draws the board, snake and apple', () => {
    const controller = createController();
    controller.apple = { position: { x: 0, y: 0 }, kind: '🍎' };
    const frame = renderFrame(controller, size, { theme });

    expect(frame.startsWith('\x1b[2J\x1b[H')).toBe(true);
    expect(frame).toContain(`\x1b[13;41H\x1b[31m██`);
    expect(frame).toContain('\x1b[3;19H🍎');
  });

  it('shows the logo until the first input', () => {
    const controller = createController();
    expect(renderFrame(controller, size, { theme })).toContain(LOGO[0]);

    controller.lastEvent = keyEvent('ArrowUp');
    expect(renderFrame(controller, size, { theme })).not.toContain(LOGO[0]);
  });

  it('shows the last event under the board in debug mode', () => {
    const controller = createController();
    controller.lastEvent = keyEvent('ArrowUp');
    const frame = renderFrame(controller, size, { theme, debug: true });
    expect(frame).toContain(`\x1b[25;18H${theme.text}Got: \x1b[2mKey(ArrowUp)${ANSI_RESET}`);
  });

  it('omits the trace outside debug mode', () => {
    const controller = createController();
    controller.lastEvent = keyEvent('ArrowUp');
    expect(renderFrame(controller, size, { theme })).not.toContain('Got: ');
  });

  it('does not modify the controller', () => {
    const controller = createController();
    controller.apple = { position: { x: 1, y: 1 }, kind: '🍎' };
    const frozen = Object.freeze(controller);
    expect(() => renderFrame(frozen, size, { theme, debug: true })).not.toThrow();
    expect(frozen.apple).toEqual({ position: { x: 1, y: 1 }, kind: '🍎' });
  });

  it('follows the terminal size', () => {
    const controller = createController();
    expect(renderFrame(controller, { cols: 120, rows: 40 }, { theme })).toContain('\x1b[21;61H\x1b[31m██');
  });
});

describe('renderEndScreen', () => {
  it('shows the logo and the centred score', () => {
    const controller = createController();
    controller.score = 3;
    controller.lost = true;
    const screen = renderEndScreen(controller, size, { theme });

    expect(screen.startsWith('\x1b[2J\x1b[H')).toBe(true);
    expect(screen).toContain(LOGO[0]);
    expect(screen).toContain(`\x1b[18;35H${theme.text}Your Score: 3${ANSI_RESET}`);
    expect(screen).not.toContain('██');
  });
});
