/**
 * Snake body as a ring buffer
 *
 * Index 0 is the head, the last index the tail. Moving re-uses the tail's
 * slot for the new head, so a move costs O(1) whatever the length.
 */

import { type Position, samePosition } from './coords';

export class SnakeBody implements Iterable<Position> {
  private cells: Position[];
  /** Slot holding the head */
  private headSlot = 0;

  constructor(cells: readonly Position[]) {
    if (cells.length === 0) {
      throw new RangeError('Snake body needs at least one cell');
    }
    this.cells = cells.map(cell => ({ x: cell.x, y: cell.y }));
  }

  get length(): number {
    return this.cells.length;
  }

  get head(): Position {
    return this.cells[this.headSlot];
  }

  get tail(): Position {
    return this.at(this.cells.length - 1);
  }

  at(index: number): Position {
    if (!Number.isInteger(index) || index < 0 || index >= this.cells.length) {
      throw new RangeError(`Snake body index ${index} out of range (length ${this.cells.length})`);
    }
    return this.cells[(this.headSlot + index) % this.cells.length];
  }

  /**
   * Every cell shifts one place toward the tail; the old tail cell is
   * dropped and `next` becomes the head.
   */
  advance(next: Position): void {
    const size = this.cells.length;
    this.headSlot = (this.headSlot - 1 + size) % size;
    this.cells[this.headSlot] = { x: next.x, y: next.y };
  }

  /**
   * Add a copy of the tail cell. It stays stacked on the tail until the
   * next advance pulls the rest of the body forward.
   */
  grow(): void {
    const tail = this.tail;
    const tailSlot = (this.headSlot + this.cells.length - 1) % this.cells.length;
    this.cells.splice(tailSlot + 1, 0, { x: tail.x, y: tail.y });
    if (tailSlot + 1 <= this.headSlot) {
      this.headSlot++;
    }
  }

  /**
   * Whether `pos` is covered by a cell at `fromIndex` or later
   */
  includes(pos: Position, fromIndex = 0): boolean {
    for (let i = Math.max(0, fromIndex); i < this.cells.length; i++) {
      if (samePosition(this.at(i), pos)) return true;
    }
    return false;
  }

  toArray(): Position[] {
    return [...this];
  }

  *[Symbol.iterator](): Iterator<Position> {
    for (let i = 0; i < this.cells.length; i++) {
      yield this.at(i);
    }
  }
}
