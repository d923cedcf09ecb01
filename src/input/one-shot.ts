import { ObserverList } from "./observers";

/**
 * Promise that settles at most once, with try-resolve semantics:
 * resolving an already resolved future is a silent no-op.
 * Never rejects; an abandoned future simply stays pending.
 *
 * Continuations registered with onResolved() run synchronously inside
 * tryResolve(), before it returns. Reactions on `promise` run later, as
 * microtasks.
 */
export class OneShotFuture<T> {
  readonly promise: Promise<T>;
  private resolveFn: (value: T) => void = () => undefined;
  private readonly continuations = new ObserverList<[T]>();
  private result: { value: T } | undefined;

  constructor() {
    this.promise = new Promise<T>((resolve) => {
      this.resolveFn = resolve;
    });
  }

  get isSettled(): boolean {
    return this.result !== undefined;
  }

  /**
   * Run `continuation` synchronously when the future resolves, or right away
   * if it already has.
   * @returns Unsubscribe function
   */
  onResolved(continuation: (value: T) => void): () => void {
    if (this.result !== undefined) {
      continuation(this.result.value);
      return () => undefined;
    }
    return this.continuations.subscribe(continuation);
  }

  /** @returns Whether this call settled the future */
  tryResolve(value: T): boolean {
    if (this.result !== undefined) return false;
    this.result = { value };
    this.resolveFn(value);
    try {
      this.continuations.notify(value);
    } finally {
      this.continuations.clear();
    }
    return true;
  }
}

/**
 * Read-only side of a one-shot cancellation signal handed to consumers.
 * Once signaled it stays signaled; it is never reset or reused.
 */
export type CancelToken = Readonly<{
  isSignaled: () => boolean;
  /** Listener added after signaling runs immediately. */
  onSignaled: (listener: () => void) => () => void;
  whenSignaled: () => Promise<void>;
  /** Aborted together with the token, for AbortSignal-aware APIs. */
  abortSignal: AbortSignal;
}>;

/**
 * One-shot, non-renewing cancellation signal.
 * The owner calls signal() and then dispose() to release listeners;
 * consumers only ever see the CancelToken view.
 */
export class OneShotSignal {
  readonly token: CancelToken;
  private readonly listeners = new ObserverList();
  private readonly fired = new OneShotFuture<void>();
  private readonly controller = new AbortController();
  private signaled = false;
  private disposed = false;

  constructor() {
    this.token = Object.freeze({
      abortSignal: this.controller.signal,
      isSignaled: (): boolean => this.signaled,
      onSignaled: (listener: () => void): (() => void) => {
        if (this.signaled) {
          listener();
          return () => undefined;
        }
        if (this.disposed) return () => undefined;
        return this.listeners.subscribe(listener);
      },
      whenSignaled: (): Promise<void> => this.fired.promise,
    });
  }

  get isSignaled(): boolean {
    return this.signaled;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /** Idempotent; listeners run synchronously on the first call only. */
  signal(): void {
    if (this.signaled) return;
    this.signaled = true;
    this.fired.tryResolve();
    this.controller.abort();
    this.listeners.notify();
  }

  /** Release listener references. Signaled state is kept. */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.listeners.clear();
  }
}
