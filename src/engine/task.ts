import { describeError, type Logger } from '../logger.js';

export type TaskBody = (signal: AbortSignal) => Promise<void>;

/**
 * Background unit of concurrent execution.
 *
 * `abort()` is fire-and-forget: it signals the body and returns at once.
 * The body is expected to release its I/O when the signal fires. A failure
 * of the body after abort is ignored; any other failure is logged and never
 * propagates to whoever spawned the task.
 */
export class Task {
  readonly done: Promise<void>;
  private readonly controller = new AbortController();
  private finished = false;

  constructor(
    readonly name: string,
    body: TaskBody,
    logger: Logger
  ) {
    this.done = body(this.controller.signal).then(
      () => {
        this.finished = true;
      },
      (error: unknown) => {
        this.finished = true;
        if (!this.controller.signal.aborted) {
          logger.warn(`${name} ended: ${describeError(error)}`);
        }
      }
    );
  }

  abort(): void {
    this.controller.abort();
  }

  get aborted(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * True once the body has returned or thrown
   */
  get isFinished(): boolean {
    return this.finished;
  }
}

export function spawn(name: string, body: TaskBody, logger: Logger): Task {
  return new Task(name, body, logger);
}
