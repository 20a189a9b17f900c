/** Seconds since creation or the last `reset` */
export class Stopwatch {
  private readonly now: () => number;
  private start: number;

  /** `now` returns milliseconds, like `performance.now` */
  constructor(now: () => number = () => performance.now()) {
    this.now = now;
    this.start = now();
  }

  time(): number {
    return (this.now() - this.start) / 1000;
  }

  reset(): void {
    this.start = this.now();
  }
}
