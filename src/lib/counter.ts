/**
 * Counts dispatched-but-unfinished work. `drained` settles exactly once, the
 * first time the count falls back to zero.
 */
export class WorkCounter {
  private count = 0;
  private settled = false;
  private resolveDrained: () => void = () => {};
  readonly drained: Promise<void>;

  constructor(initial = 0) {
    this.count = initial;
    this.drained = new Promise<void>((resolve) => {
      this.resolveDrained = resolve;
    });
  }

  get outstanding(): number {
    return this.count;
  }

  add(n = 1): void {
    if (this.settled) {
      throw new Error("WorkCounter: add after the counter drained");
    }
    this.count += n;
  }

  done(): void {
    if (this.count <= 0) {
      throw new Error("WorkCounter: done called more times than add");
    }

    this.count -= 1;
    if (this.count === 0) {
      this.settled = true;
      this.resolveDrained();
    }
  }
}
