/**
 * A single-resolution signal with a mandatory timeout.
 *
 * The first of `resolve`, `reject` or the timeout wins; later calls are
 * ignored and report `false`.
 */
export class OneShot<T> {
  readonly promise: Promise<T>;
  private settled = false;
  private resolveFn: (value: T) => void = () => undefined;
  private rejectFn: (error: Error) => void = () => undefined;
  private timer: ReturnType<typeof setTimeout>;

  constructor(timeoutMs: number, onTimeout: () => Error) {
    this.promise = new Promise<T>((resolve, reject) => {
      this.resolveFn = resolve;
      this.rejectFn = reject;
    });
    this.timer = setTimeout(() => {
      this.reject(onTimeout());
    }, timeoutMs);
  }

  get isSettled(): boolean {
    return this.settled;
  }

  resolve(value: T): boolean {
    if (this.settled) {
      return false;
    }
    this.settled = true;
    clearTimeout(this.timer);
    this.resolveFn(value);
    return true;
  }

  reject(error: Error): boolean {
    if (this.settled) {
      return false;
    }
    this.settled = true;
    clearTimeout(this.timer);
    this.rejectFn(error);
    return true;
  }
}
