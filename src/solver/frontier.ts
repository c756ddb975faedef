/**
 * Frontier containers: the one axis the search methods differ on
 */

export interface Frontier<T> {
  push(item: T, priority: number): void;
  pop(): T | undefined;
  isEmpty(): boolean;
  size(): number;
  /** Current contents in the order they would be popped */
  toArray(): T[];
}

interface QueueEntry<T> {
  item: T;
  priority: number;
  sequence: number;
}

/**
 * Binary min-heap on priority. Equal priorities pop in insertion order.
 */
export class PriorityQueue<T> implements Frontier<T> {
  private items: QueueEntry<T>[] = [];
  private sequence = 0;

  push(item: T, priority: number): void {
    // Binary heap insert
    this.items.push({ item, priority, sequence: this.sequence++ });
    this.bubbleUp(this.items.length - 1);
  }

  pop(): T | undefined {
    if (this.items.length === 0) return undefined;

    const result = this.items[0];
    const last = this.items.pop();

    if (this.items.length > 0 && last !== undefined) {
      this.items[0] = last;
      this.bubbleDown(0);
    }

    return result.item;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  size(): number {
    return this.items.length;
  }

  toArray(): T[] {
    return [...this.items]
      .sort((a, b) => (a.priority - b.priority) || (a.sequence - b.sequence))
      .map(entry => entry.item);
  }

  private before(a: QueueEntry<T>, b: QueueEntry<T>): boolean {
    return a.priority < b.priority || (a.priority === b.priority && a.sequence < b.sequence);
  }

  private bubbleUp(index: number): void {
    while (index > 0) {
      const parentIndex = Math.floor((index - 1) / 2);
      if (!this.before(this.items[index], this.items[parentIndex])) {
        break;
      }
      [this.items[parentIndex], this.items[index]] = [this.items[index], this.items[parentIndex]];
      index = parentIndex;
    }
  }

  private bubbleDown(index: number): void {
    while (true) {
      const leftChild = 2 * index + 1;
      const rightChild = 2 * index + 2;
      let smallest = index;

      if (leftChild < this.items.length && this.before(this.items[leftChild], this.items[smallest])) {
        smallest = leftChild;
      }

      if (rightChild < this.items.length && this.before(this.items[rightChild], this.items[smallest])) {
        smallest = rightChild;
      }

      if (smallest === index) break;

      [this.items[smallest], this.items[index]] = [this.items[index], this.items[smallest]];
      index = smallest;
    }
  }
}

/**
 * First in, first out. Priority is ignored.
 */
export class FifoQueue<T> implements Frontier<T> {
  private items: T[] = [];
  private head = 0;

  push(item: T): void {
    this.items.push(item);
  }

  pop(): T | undefined {
    if (this.head >= this.items.length) return undefined;

    const item = this.items[this.head++];

    // Drop the consumed prefix once it dominates the buffer
    if (this.head > 1024 && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }

    return item;
  }

  isEmpty(): boolean {
    return this.head >= this.items.length;
  }

  size(): number {
    return this.items.length - this.head;
  }

  toArray(): T[] {
    return this.items.slice(this.head);
  }
}

/**
 * Last in, first out. Priority is ignored.
 */
export class LifoStack<T> implements Frontier<T> {
  private items: T[] = [];

  push(item: T): void {
    this.items.push(item);
  }

  pop(): T | undefined {
    return this.items.pop();
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  size(): number {
    return this.items.length;
  }

  toArray(): T[] {
    return [...this.items].reverse();
  }
}
