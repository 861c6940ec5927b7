export interface WorkerSlot {
  readonly id: number;
  /** Returns the slot to the pool. Calling it again has no effect. */
  release(): void;
}

/**
 * Fixed number of slots for active jobs. A slot is either free or held by
 * exactly one job.
 */
export class WorkerPool {
  private readonly free: number[];

  constructor(readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError('Worker pool size must be a positive integer');
    }
    this.free = Array.from({ length: size }, (_, i) => i + 1);
  }

  get available(): number {
    return this.free.length;
  }

  get inUse(): number {
    return this.size - this.free.length;
  }

  tryAcquire(): WorkerSlot | null {
    const id = this.free.shift();
    if (id === undefined) {
      return null;
    }

    let released = false;
    return {
      id,
      release: () => {
        if (released) return;
        released = true;
        this.free.push(id);
      },
    };
  }
}
