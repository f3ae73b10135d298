import type { ListContainer } from "./container-contract.js";
import { panic } from "./runtime-fault.js";

/** Slot number in the node arena. */
type Slot = number;

const NIL: Slot = -1;

type ChainNode<T> = {
  value: T;
  next: Slot;
};

type AccessCache = {
  valid: boolean;
  index: number;
  slot: Slot;
};

export type ChainListOptions = {
  /** Reuse the last resolved (index, node) pair for forward access. Defaults to true. */
  accessCache?: boolean;
  /** Prefix used in fault messages, mirroring the emitted definition name. */
  name?: string;
};

/**
 * Singly linked list with an access cache for ascending indexed access.
 *
 * Nodes live in an arena and refer to each other by slot number, so `tail`
 * and the cached node are plain indices that are dropped (cache) or repaired
 * (tail) whenever the chain is restructured. Released slots are recycled by
 * later allocations.
 *
 * Sequential `get(0)`, `get(1)`, ... costs one hop per call; descending or
 * random access falls back to walking from the head.
 */
export class ChainList<T> implements ListContainer<T>, Iterable<T> {
  private readonly nodes: (ChainNode<T> | undefined)[] = [];
  private readonly freeSlots: Slot[] = [];
  private head: Slot = NIL;
  private tail: Slot = NIL;
  private count = 0;
  private readonly cache: AccessCache = { valid: false, index: 0, slot: NIL };
  private readonly useCache: boolean;
  private readonly name: string;
  private steps = 0;

  constructor({ accessCache = true, name = "list" }: ChainListOptions = {}) {
    this.useCache = accessCache;
    this.name = name;
  }

  static from<T>(values: Iterable<T>, options?: ChainListOptions): ChainList<T> {
    const list = new ChainList<T>(options);
    for (const value of values) {
      list.append(value);
    }
    return list;
  }

  size(): number {
    return this.count;
  }

  append(value: T): void {
    this.invalidateCache();
    const slot = this.allocate(value, NIL);

    if (this.head === NIL) {
      this.head = slot;
      this.tail = slot;
      this.count++;
      return;
    }

    this.node(this.tail).next = slot;
    this.tail = slot;
    this.count++;
  }

  get(index: number): T {
    return this.node(this.locate(index, "get")).value;
  }

  set(index: number, value: T): void {
    this.node(this.locate(index, "set")).value = value;
  }

  delete(index: number): void {
    this.invalidateCache();
    this.assertIndex(index, "del");

    if (index === 0) {
      if (this.head === NIL) {
        return this.fault("del");
      }
      const removed = this.head;
      this.head = this.node(removed).next;
      this.release(removed);
      this.count--;
      if (this.head === NIL) {
        this.tail = NIL;
      }
      return;
    }

    const previous = this.walk(index - 1);
    if (previous === NIL) {
      return this.fault("del");
    }
    const previousNode = this.node(previous);
    const removed = previousNode.next;
    if (removed === NIL) {
      return this.fault("del");
    }

    previousNode.next = this.node(removed).next;
    if (removed === this.tail) {
      this.tail = previous;
    }
    this.release(removed);
    this.count--;
  }

  insert(index: number, value: T): void {
    this.invalidateCache();
    this.assertIndex(index, "insert");

    if (index === 0) {
      const slot = this.allocate(value, this.head);
      if (this.head === NIL) {
        this.tail = slot;
      }
      this.head = slot;
      this.count++;
      return;
    }

    const previous = this.walk(index - 1);
    if (previous === NIL) {
      return this.fault("insert");
    }
    const previousNode = this.node(previous);
    const slot = this.allocate(value, previousNode.next);
    previousNode.next = slot;
    if (this.node(slot).next === NIL) {
      this.tail = slot;
    }
    this.count++;
  }

  toArray(): T[] {
    return Array.from(this);
  }

  *[Symbol.iterator](): Iterator<T> {
    for (let slot = this.head; slot !== NIL; slot = this.node(slot).next) {
      yield this.node(slot).value;
    }
  }

  /** Number of nodes reachable from the head, counted by walking the chain. */
  chainLength(): number {
    let length = 0;
    for (let slot = this.head; slot !== NIL; slot = this.node(slot).next) {
      length++;
    }
    return length;
  }

  /** Successor hops taken by indexed operations since construction. */
  get traversalSteps(): number {
    return this.steps;
  }

  get capacity(): number {
    return this.nodes.length;
  }

  get liveSlots(): number {
    return this.nodes.length - this.freeSlots.length;
  }

  private locate(index: number, operation: "get" | "set"): Slot {
    this.assertIndex(index, operation);

    let cursor = this.head;
    let remaining = index;

    // The chain only links forward, so the cache can only shortcut requests at
    // or after the cached position.
    if (this.useCache && this.cache.valid && index >= this.cache.index) {
      cursor = this.cache.slot;
      remaining = index - this.cache.index;
    }

    while (cursor !== NIL && remaining > 0) {
      cursor = this.node(cursor).next;
      remaining--;
      this.steps++;
    }

    if (remaining > 0 || cursor === NIL) {
      return this.fault(operation);
    }

    if (this.useCache) {
      this.cache.valid = true;
      this.cache.index = index;
      this.cache.slot = cursor;
    }
    return cursor;
  }

  /** Node `position` hops from the head, or NIL when the chain is shorter. */
  private walk(position: number): Slot {
    let cursor = this.head;
    let remaining = position;
    while (cursor !== NIL && remaining > 0) {
      cursor = this.node(cursor).next;
      remaining--;
      this.steps++;
    }
    return cursor;
  }

  private invalidateCache(): void {
    this.cache.valid = false;
  }

  private allocate(value: T, next: Slot): Slot {
    const node: ChainNode<T> = { value, next };
    const reused = this.freeSlots.pop();
    if (reused === undefined) {
      this.nodes.push(node);
      return this.nodes.length - 1;
    }
    this.nodes[reused] = node;
    return reused;
  }

  private release(slot: Slot): void {
    this.nodes[slot] = undefined;
    this.freeSlots.push(slot);
  }

  private node(slot: Slot): ChainNode<T> {
    const node = this.nodes[slot];
    if (!node) {
      throw new Error(`${this.name}: slot ${slot} is not live`);
    }
    return node;
  }

  private assertIndex(index: number, operation: string): void {
    if (!Number.isSafeInteger(index) || index < 0) {
      this.fault(operation);
    }
  }

  private fault(operation: string): never {
    return panic(`index out of bounds in ${this.name}_${operation}`);
  }
}
