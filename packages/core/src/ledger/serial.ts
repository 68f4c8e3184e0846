import { AsyncLocalStorage } from "node:async_hooks";

/**
 * Runs ledger operations one at a time, in call order.
 *
 * An operation started from inside a running one (directly, or from a
 * collaborator the running operation awaits) would wait on itself forever,
 * so it is refused instead.
 */
export class OperationQueue {
  private tail: Promise<unknown> = Promise.resolve();
  private context = new AsyncLocalStorage<string>();

  /** Name of the operation the current async context is running inside. */
  current(): string | undefined {
    return this.context.getStore();
  }

  run<T>(name: string, task: () => Promise<T>): Promise<T> {
    const next = this.tail.then(() => this.context.run(name, task));
    this.tail = next.catch(() => undefined);
    return next;
  }
}
