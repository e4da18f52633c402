/**
 * Source of session ids.
 */
export interface IdAllocator {
  /** Allocate and return the next id */
  nextId(): number;
  /**
   * The id the next allocation would return if nothing else allocates first.
   * Informational only: another creation may take that id before the caller does.
   */
  peekNextId(): number;
  /** The most recently allocated id (0 before the first allocation) */
  lastAllocatedId(): number;
}

/**
 * Monotonic counter starting at 1.
 *
 * Every call runs to completion on the event loop, so ids handed out to
 * interleaved callers never repeat and always increase.
 */
export class CounterIdAllocator implements IdAllocator {
  private current: number;

  constructor(start = 0) {
    this.current = start;
  }

  nextId(): number {
    this.current += 1;
    return this.current;
  }

  peekNextId(): number {
    return this.current + 1;
  }

  lastAllocatedId(): number {
    return this.current;
  }
}

/**
 * Process-wide allocator used when no allocator is injected.
 */
export const processIdAllocator: IdAllocator = new CounterIdAllocator();
