type PendingTask = {
  run: () => Promise<void>;
};

export class WorkerPool {
  private readonly size: number;
  private active = 0;
  private readonly pending: PendingTask[] = [];

  constructor(size: number) {
    this.size = Math.max(1, Math.floor(size));
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.pending.push({
        run: () => task().then(resolve, reject)
      });
      this.drain();
    });
  }

  private drain() {
    while (this.active < this.size && this.pending.length > 0) {
      const next = this.pending.shift();
      if (!next) {
        break;
      }
      this.active += 1;
      void next.run().finally(() => {
        this.active -= 1;
        this.drain();
      });
    }
  }
}
