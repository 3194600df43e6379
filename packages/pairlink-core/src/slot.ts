// Single-assignment slot for racing connection attempts.

type SlotState<T> =
  | { kind: "empty" }
  | { kind: "filled"; value: T }
  | { kind: "cancelled" };

/**
 * A slot that accepts exactly one value.
 *
 * Racing producers call `offer()`; the first one wins and every later offer is
 * refused, leaving the loser responsible for disposing of its candidate.
 * Consumers `wait()` for the winner. Cancelling an empty slot refuses all
 * future offers and releases waiters with `null`.
 */
export class HandleSlot<T> {
  private state: SlotState<T> = { kind: "empty" };
  private waiters: Array<(value: T | null) => void> = [];

  /** True once the slot holds a value or was cancelled. */
  get settled(): boolean {
    return this.state.kind !== "empty";
  }

  get value(): T | undefined {
    return this.state.kind === "filled" ? this.state.value : undefined;
  }

  /** Install `candidate` if the slot is still empty. */
  offer(candidate: T): boolean {
    if (this.state.kind !== "empty") return false;
    this.state = { kind: "filled", value: candidate };
    this.release(candidate);
    return true;
  }

  /** Refuse all future offers. A value already installed stays. */
  cancel(): void {
    if (this.state.kind !== "empty") return;
    this.state = { kind: "cancelled" };
    this.release(null);
  }

  /**
   * Wait for the winning value.
   *
   * Resolves with `null` if the slot is cancelled or `timeoutMs` elapses
   * first.
   */
  wait(timeoutMs?: number): Promise<T | null> {
    if (this.state.kind === "filled") return Promise.resolve(this.state.value);
    if (this.state.kind === "cancelled") return Promise.resolve(null);

    return new Promise((resolve) => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const waiter = (value: T | null) => {
        if (timer !== undefined) clearTimeout(timer);
        resolve(value);
      };
      this.waiters.push(waiter);

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          const idx = this.waiters.indexOf(waiter);
          if (idx !== -1) this.waiters.splice(idx, 1);
          resolve(null);
        }, timeoutMs);
      }
    });
  }

  private release(value: T | null): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter(value);
    }
  }
}
