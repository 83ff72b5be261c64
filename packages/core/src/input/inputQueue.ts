/**
 * packages/core/src/input/inputQueue.ts — Bounded FIFO between the input
 * context and the frame loop.
 *
 * The producer never blocks: when the queue is full the incoming event is
 * dropped and counted.
 */

import { invalidProps } from "../errors.js";
import type { KeyEvent } from "./keys.js";

export const DEFAULT_INPUT_QUEUE_CAPACITY = 100;

export class InputQueue<T = KeyEvent> {
  readonly capacity: number;
  private items: T[] = [];
  private droppedCount = 0;

  constructor(capacity = DEFAULT_INPUT_QUEUE_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      invalidProps(`input queue capacity must be a positive integer (got ${String(capacity)})`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.items.length;
  }

  /** Events rejected because the queue was full. */
  get dropped(): number {
    return this.droppedCount;
  }

  /** Returns false when the event was dropped. */
  push(event: T): boolean {
    if (this.items.length >= this.capacity) {
      this.droppedCount++;
      return false;
    }
    this.items.push(event);
    return true;
  }

  /** Remove and return everything queued, oldest first. */
  drain(): T[] {
    const out = this.items;
    this.items = [];
    return out;
  }

  clear(): void {
    this.items = [];
  }
}
