import { compareNodeIds } from "./graph.js";
import type { FrontierEntry } from "./types.js";

export type Discipline = "stack" | "queue" | "priority";

export interface Frontier {
  readonly size: number;
  push(entry: FrontierEntry): void;
  pop(): FrontierEntry | undefined;
}

export class StackFrontier implements Frontier {
  private readonly items: FrontierEntry[] = [];

  get size(): number {
    return this.items.length;
  }

  push(entry: FrontierEntry): void {
    this.items.push(entry);
  }

  pop(): FrontierEntry | undefined {
    return this.items.pop();
  }
}

export class QueueFrontier implements Frontier {
  private items: FrontierEntry[] = [];
  private head = 0;

  get size(): number {
    return this.items.length - this.head;
  }

  push(entry: FrontierEntry): void {
    this.items.push(entry);
  }

  pop(): FrontierEntry | undefined {
    if (this.head >= this.items.length) {
      return undefined;
    }
    const entry = this.items[this.head];
    this.head++;
    // Compact once the consumed prefix dominates the backing array
    if (this.head > 64 && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
    return entry;
  }
}

type HeapItem = {
  entry: FrontierEntry;
  priority: number;
  seq: number;
};

function before(a: HeapItem, b: HeapItem): boolean {
  if (a.priority !== b.priority) {
    return a.priority < b.priority;
  }
  const byNode = compareNodeIds(a.entry.node, b.entry.node);
  if (byNode !== 0) {
    return byNode < 0;
  }
  return a.seq < b.seq;
}

/**
 * Binary min-heap ordered by priority, then node id, then insertion order.
 */
export class PriorityFrontier implements Frontier {
  private readonly heap: HeapItem[] = [];
  private seq = 0;

  constructor(private readonly priorityOf: (entry: FrontierEntry) => number) {}

  get size(): number {
    return this.heap.length;
  }

  push(entry: FrontierEntry): void {
    const item: HeapItem = { entry, priority: this.priorityOf(entry), seq: this.seq++ };
    this.heap.push(item);
    this.siftUp(this.heap.length - 1);
  }

  pop(): FrontierEntry | undefined {
    const top = this.heap[0];
    if (!top) {
      return undefined;
    }
    const last = this.heap.pop();
    if (last && this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    return top.entry;
  }

  private siftUp(index: number): void {
    let i = index;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!before(this.heap[i], this.heap[parent])) break;
      this.swap(i, parent);
      i = parent;
    }
  }

  private siftDown(index: number): void {
    const n = this.heap.length;
    let i = index;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let smallest = i;
      if (left < n && before(this.heap[left], this.heap[smallest])) smallest = left;
      if (right < n && before(this.heap[right], this.heap[smallest])) smallest = right;
      if (smallest === i) return;
      this.swap(i, smallest);
      i = smallest;
    }
  }

  private swap(a: number, b: number): void {
    const tmp = this.heap[a];
    this.heap[a] = this.heap[b];
    this.heap[b] = tmp;
  }
}

export function createFrontier(
  discipline: Discipline,
  priorityOf?: (entry: FrontierEntry) => number
): Frontier {
  switch (discipline) {
    case "stack":
      return new StackFrontier();
    case "queue":
      return new QueueFrontier();
    case "priority":
      if (!priorityOf) {
        throw new Error("priority frontier requires a priority function");
      }
      return new PriorityFrontier(priorityOf);
  }
}
