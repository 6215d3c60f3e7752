/**
 * Cancellation, deadline and request-scoped values shared by every Context
 * cloned from the same root.
 *
 * An ExecutionContext is immutable: `withCancel`, `withTimeout`,
 * `withDeadline` and `withValue` derive a child that observes the parent's
 * cancellation and values. The container never cancels anything itself; it
 * only forwards the signal to factories.
 */
export class ExecutionContext {
  private static readonly root = new ExecutionContext(new AbortController().signal);

  private constructor(
    readonly signal: AbortSignal,
    private readonly deadlineAt?: Date,
    private readonly values: ReadonlyMap<unknown, unknown> = new Map()
  ) {}

  /** Wrap an existing signal, e.g. one taken from a request. */
  static fromSignal(signal: AbortSignal): ExecutionContext {
    return new ExecutionContext(signal);
  }

  /** Never cancelled, no deadline, no values. */
  static background(): ExecutionContext {
    return ExecutionContext.root;
  }

  /**
   * Derive a child that is cancelled when `cancel` is called or when the
   * parent is cancelled, whichever happens first.
   */
  static withCancel(parent: ExecutionContext): [ExecutionContext, (reason?: unknown) => void] {
    const controller = linkedController(parent.signal);
    const child = new ExecutionContext(controller.signal, parent.deadlineAt, parent.values);
    return [child, (reason?: unknown) => controller.abort(reason)];
  }

  /**
   * Derive a child cancelled at `deadline`. A parent deadline that is earlier
   * wins.
   */
  static withDeadline(
    parent: ExecutionContext,
    deadline: Date
  ): [ExecutionContext, (reason?: unknown) => void] {
    const effective =
      parent.deadlineAt && parent.deadlineAt.getTime() <= deadline.getTime()
        ? parent.deadlineAt
        : deadline;

    const controller = linkedController(parent.signal);
    const remaining = effective.getTime() - Date.now();

    if (remaining <= 0) {
      controller.abort(deadlineExceeded());
    } else if (!controller.signal.aborted) {
      const timer = setTimeout(() => controller.abort(deadlineExceeded()), remaining);
      timer.unref?.();
      controller.signal.addEventListener('abort', () => clearTimeout(timer), { once: true });
    }

    const child = new ExecutionContext(controller.signal, effective, parent.values);
    return [child, (reason?: unknown) => controller.abort(reason)];
  }

  /** Shorthand for `withDeadline(parent, now + ms)`. */
  static withTimeout(
    parent: ExecutionContext,
    ms: number
  ): [ExecutionContext, (reason?: unknown) => void] {
    return ExecutionContext.withDeadline(parent, new Date(Date.now() + ms));
  }

  /** Derive a child carrying `key → value` on top of the parent's values. */
  static withValue(parent: ExecutionContext, key: unknown, value: unknown): ExecutionContext {
    const values = new Map(parent.values);
    values.set(key, value);
    return new ExecutionContext(parent.signal, parent.deadlineAt, values);
  }

  /** Deadline, if one was set on this context or an ancestor. */
  deadline(): Date | undefined {
    return this.deadlineAt;
  }

  /** Cancellation reason once cancelled, otherwise `undefined`. */
  err(): unknown {
    return this.signal.aborted ? this.signal.reason : undefined;
  }

  value(key: unknown): unknown {
    return this.values.get(key);
  }
}

function linkedController(parent: AbortSignal): AbortController {
  const controller = new AbortController();

  if (parent.aborted) {
    controller.abort(parent.reason);
    return controller;
  }

  const onAbort = () => controller.abort(parent.reason);
  parent.addEventListener('abort', onAbort, { once: true });
  controller.signal.addEventListener(
    'abort',
    () => parent.removeEventListener('abort', onAbort),
    { once: true }
  );

  return controller;
}

/**
 * Abort reason of a context whose deadline passed.
 */
export class DeadlineExceededError extends Error {
  constructor() {
    super('Deadline exceeded');
    this.name = 'DeadlineExceededError';
  }
}

function deadlineExceeded(): DeadlineExceededError {
  return new DeadlineExceededError();
}
