/**
 * A push-event receiver as the callback table sees it.
 */
export interface PushListener {
  /** False once the owner is gone or has torn the listener down. */
  alive(): boolean;
  invoke(args: readonly unknown[]): void | Promise<void>;
}

/**
 * Receiver that never keeps its owner alive.
 *
 * The owner is held through a `WeakRef`; the handler receives it as its first
 * argument, so handlers must be functions that close over nothing owned by the
 * owner (module functions or static methods).
 *
 * `dispose()` is the liveness token set by the owner's own teardown. Once
 * disposed, the listener stays dead even while the owner lives on.
 */
export class WeakListener<T extends object> implements PushListener {
  private readonly target: WeakRef<T>;
  private disposed = false;

  constructor(
    owner: T,
    private readonly handler: (owner: T, args: readonly unknown[]) => void | Promise<void>
  ) {
    this.target = new WeakRef(owner);
  }

  alive(): boolean {
    return !this.disposed && this.target.deref() !== undefined;
  }

  invoke(args: readonly unknown[]): void | Promise<void> {
    const owner = this.disposed ? undefined : this.target.deref();
    if (owner === undefined) return;
    return this.handler(owner, args);
  }

  dispose(): void {
    this.disposed = true;
  }
}
