/**
 * Mutual exclusion for synchronous critical sections.
 *
 * Only one task runs at a time. A task submitted while another is running
 * (a re-entrant call from inside the running task, such as a header hook
 * that logs) is queued and runs after the current task, in submission order,
 * before `run` returns to the original caller.
 */
export class ExclusiveSection {
  private held = false;
  private readonly pending: Array<() => void> = [];

  run(task: () => void): void {
    if (this.held) {
      this.pending.push(task);
      return;
    }

    this.held = true;
    let failure: { error: unknown } | undefined;
    try {
      let next: (() => void) | undefined = task;
      while (next) {
        try {
          next();
        } catch (error) {
          failure ??= { error };
        }
        next = this.pending.shift();
      }
    } finally {
      this.held = false;
    }

    if (failure) {
      throw failure.error;
    }
  }

  get isHeld(): boolean {
    return this.held;
  }

  get queued(): number {
    return this.pending.length;
  }
}
