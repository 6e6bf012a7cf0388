import { PriorityQueue } from "typescript-collections";

type Ranked<T> = {
  item: T;
  seq: number;
};

/**
 * Min-priority queue used as the search frontier.
 *
 * There is no decrease-key: a cheaper route to a node is pushed as a new
 * entry and the superseded one is left in place. Searches skip those stale
 * entries when they surface. Equal priorities pop in insertion order.
 */
export class Frontier<T> {
  private queue: PriorityQueue<Ranked<T>>;
  private pushed = 0;

  /**
   * @param compare - negative when `a` should pop before `b`
   */
  constructor(compare: (a: T, b: T) => number) {
    // PriorityQueue dequeues the greatest element, so the order is reversed
    this.queue = new PriorityQueue<Ranked<T>>((a, b) => {
      const order = compare(b.item, a.item);
      return order !== 0 ? order : b.seq - a.seq;
    });
  }

  push(item: T): void {
    this.queue.enqueue({ item, seq: this.pushed++ });
  }

  pop(): T | undefined {
    return this.queue.dequeue()?.item;
  }

  size(): number {
    return this.queue.size();
  }

  isEmpty(): boolean {
    return this.queue.isEmpty();
  }
}
