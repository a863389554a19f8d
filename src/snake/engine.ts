/**
 * Snake Engine — Pure Game Logic
 *
 * Input draining, direction changes, movement, growth, apples and
 * collisions. One call to tick() is one simulation step.
 */

import { APPLE_KINDS, type AppleKind, GRID_COLS, GRID_ROWS, QUIT_KEY, START_POSITION } from './constants';
import { type Position, samePosition } from './coords';
import { EventQueue } from './eventQueue';
import { type InputEvent, type KeyInputEvent, isArrowKey } from './input';
import { SnakeBody } from './snakeBody';

// ============================================================================
// Types
// ============================================================================

export type Direction = 'up' | 'down' | 'left' | 'right' | 'stopped';

export interface Snake {
  body: SnakeBody;
  direction: Direction;
}

export interface Apple {
  position: Position;
  kind: AppleKind;
}

/** Events that can become the last observed event */
export type ObservedEvent = Exclude<InputEvent, { kind: 'resize' | 'unknown' }>;

export interface Controller {
  closeRequested: boolean;
  /** Appended to by input capture, drained once per tick */
  events: EventQueue<InputEvent>;
  lastEvent: ObservedEvent | null;
  snake: Snake;
  apple: Apple | null;
  score: number;
  lost: boolean;
}

/** Uniform random number in [0, 1) */
export type RandomSource = () => number;

// ============================================================================
// Constants
// ============================================================================

const ARROW_DIRECTIONS: Record<string, Exclude<Direction, 'stopped'>> = {
  ArrowUp: 'up',
  ArrowDown: 'down',
  ArrowLeft: 'left',
  ArrowRight: 'right',
};

const OPPOSITE: Record<Direction, Direction> = {
  up: 'down',
  down: 'up',
  left: 'right',
  right: 'left',
  stopped: 'stopped',
};

const STEP: Record<Direction, { dx: number; dy: number }> = {
  up: { dx: 0, dy: -1 },
  down: { dx: 0, dy: 1 },
  left: { dx: -1, dy: 0 },
  right: { dx: 1, dy: 0 },
  stopped: { dx: 0, dy: 0 },
};

// ============================================================================
// Creation
// ============================================================================

export function createSnake(cells: readonly Position[] = [START_POSITION], direction: Direction = 'stopped'): Snake {
  return { body: new SnakeBody(cells), direction };
}

export function createController(events: EventQueue<InputEvent> = new EventQueue()): Controller {
  return {
    closeRequested: false,
    events,
    lastEvent: null,
    snake: createSnake(),
    apple: null,
    score: 0,
    lost: false,
  };
}

// ============================================================================
// Input
// ============================================================================

function isQuitKey(event: KeyInputEvent): boolean {
  // ctrl+c never reaches us as SIGINT in raw mode, so treat it as a close
  return (event.key === QUIT_KEY && !event.ctrl && !event.alt) || (event.key === 'c' && event.ctrl);
}

/**
 * Drain the input queue. Quit keys raise closeRequested; the newest key or
 * mouse event becomes lastEvent. Resize events need no handling since every
 * frame is laid out from the current size.
 */
export function handleEvents(controller: Controller): void {
  for (const event of controller.events.drain()) {
    switch (event.kind) {
      case 'key':
        if (isQuitKey(event)) {
          controller.closeRequested = true;
        }
        controller.lastEvent = event;
        break;
      case 'mouse':
        controller.lastEvent = event;
        break;
      case 'resize':
      case 'unknown':
        break;
    }
  }
}

/**
 * Turn the snake toward the last arrow key, unless that would reverse it
 * straight into its own neck.
 */
export function applyDirectionIntent(snake: Snake, event: ObservedEvent | null): void {
  if (!event || !isArrowKey(event)) return;
  const wanted = ARROW_DIRECTIONS[event.key];
  if (!wanted) return;
  if (OPPOSITE[snake.direction] === wanted) return;
  snake.direction = wanted;
}

// ============================================================================
// Movement
// ============================================================================

export function isInBounds(pos: Position): boolean {
  return pos.x >= 0 && pos.x < GRID_COLS && pos.y >= 0 && pos.y < GRID_ROWS;
}

export function nextHead(head: Position, direction: Direction): Position {
  const { dx, dy } = STEP[direction];
  return { x: head.x + dx, y: head.y + dy };
}

/**
 * Move one cell in the current direction. Leaving the grid loses the game
 * and leaves the snake where it was.
 */
export function advanceSnake(controller: Controller): void {
  const { snake } = controller;
  if (snake.direction === 'stopped') return;

  const next = nextHead(snake.body.head, snake.direction);
  if (!isInBounds(next)) {
    controller.lost = true;
    return;
  }
  snake.body.advance(next);
}

/**
 * Head on the apple: eat it, score, grow.
 * @returns whether an apple was eaten
 */
export function eatApple(controller: Controller): boolean {
  const { apple, snake } = controller;
  if (!apple || !samePosition(apple.position, snake.body.head)) return false;

  controller.apple = null;
  controller.score += 1;
  snake.body.grow();
  return true;
}

/**
 * Place an apple uniformly at random on a cell the snake does not cover.
 * Returns null when the snake fills the whole grid.
 */
export function spawnApple(snake: Snake, random: RandomSource = Math.random): Apple | null {
  const occupied = new Set<string>();
  for (const cell of snake.body) {
    occupied.add(`${cell.x},${cell.y}`);
  }

  const free: Position[] = [];
  for (let y = 0; y < GRID_ROWS; y++) {
    for (let x = 0; x < GRID_COLS; x++) {
      if (!occupied.has(`${x},${y}`)) free.push({ x, y });
    }
  }
  if (free.length === 0) return null;

  const position = free[Math.floor(random() * free.length)];
  const kind = APPLE_KINDS[Math.floor(random() * APPLE_KINDS.length)];
  return { position, kind };
}

/**
 * Head against the body from index 2 on. Index 1 is always next to the head
 * (or on it, right after growing from a single cell) and never counts.
 */
export function hitsItself(body: SnakeBody): boolean {
  return body.includes(body.head, 2);
}

// ============================================================================
// Step
// ============================================================================

/**
 * Everything after input draining: turn, move, eat, respawn, collide.
 * Does nothing once the game is lost.
 */
export function advanceGame(controller: Controller, random: RandomSource = Math.random): void {
  if (controller.lost) return;

  applyDirectionIntent(controller.snake, controller.lastEvent);
  advanceSnake(controller);
  eatApple(controller);

  if (!controller.apple) {
    controller.apple = spawnApple(controller.snake, random);
  }

  if (hitsItself(controller.snake.body)) {
    controller.lost = true;
  }
}

/**
 * One full simulation step
 */
export function tick(controller: Controller, random: RandomSource = Math.random): void {
  handleEvents(controller);
  advanceGame(controller, random);
}
