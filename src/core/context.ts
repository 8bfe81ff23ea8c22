import { v4 as uuidv4 } from 'uuid';

/**
 * Per-call execution context handed to the inventory engine. The signal
 * aborts when the deadline passes or the caller gives up.
 */
export interface ExecutionContext {
  readonly requestId: string;
  readonly signal: AbortSignal;
  readonly deadline: Date;
}

export interface ExecutionContextHandle {
  readonly context: ExecutionContext;
  abort(reason: Error): void;
  dispose(): void;
}

export class DeadlineExceededError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Deadline of ${timeoutMs}ms exceeded`);
    this.name = 'DeadlineExceededError';
  }
}

export function createExecutionContext(options: {
  timeoutMs: number;
  requestId?: string;
}): ExecutionContextHandle {
  const controller = new AbortController();
  const deadline = new Date(Date.now() + options.timeoutMs);
  const timer = setTimeout(() => {
    controller.abort(new DeadlineExceededError(options.timeoutMs));
  }, options.timeoutMs);
  timer.unref();

  return {
    context: {
      requestId: options.requestId || uuidv4(),
      signal: controller.signal,
      deadline,
    },
    abort(reason: Error) {
      clearTimeout(timer);
      controller.abort(reason);
    },
    dispose() {
      clearTimeout(timer);
    },
  };
}

/**
 * Milliseconds left before the deadline, never below 1
 */
export function remainingMs(context: ExecutionContext, now: number = Date.now()): number {
  return Math.max(1, context.deadline.getTime() - now);
}
