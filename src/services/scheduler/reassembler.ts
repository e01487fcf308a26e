/**
 * Buffers out-of-order completions and hands them back strictly by ordinal:
 * item k comes out only after 1..k-1 have.
 */
export class Reassembler<T> {
  private readonly buffer = new Map<number, T>();
  private readonly seen = new Set<number>();
  private next = 1;

  constructor(readonly total: number) {}

  /** Ordinal the next release is waiting on. */
  get nextOrdinal(): number {
    return this.next;
  }

  /** Completions held back behind a missing ordinal. */
  get buffered(): number {
    return this.buffer.size;
  }

  get done(): boolean {
    return this.next > this.total;
  }

  /**
   * Record a completion and return everything that can now be released,
   * in order (possibly nothing).
   */
  accept(ordinal: number, item: T): T[] {
    if (!Number.isInteger(ordinal) || ordinal < 1 || ordinal > this.total) {
      throw new RangeError(`Ordinal ${ordinal} outside 1..${this.total}`);
    }
    if (this.seen.has(ordinal)) {
      throw new Error(`Ordinal ${ordinal} completed twice`);
    }
    this.seen.add(ordinal);
    this.buffer.set(ordinal, item);

    const ready: T[] = [];
    let head = this.buffer.get(this.next);
    while (head !== undefined) {
      ready.push(head);
      this.buffer.delete(this.next);
      this.next++;
      head = this.buffer.get(this.next);
    }
    return ready;
  }
}
