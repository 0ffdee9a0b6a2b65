import { AlreadyRunningError, errorMessage } from "../shared/errors.js";
import { createConsoleLogger, type Logger } from "../shared/logger.js";
import type { RunnerState, TaskHandle, TaskOutcome, TaskSpec } from "../shared/types.js";
import { openQuietly } from "./opener.js";
import { createTaskContext, runAlgorithm, type TaskContext } from "./tasks/index.js";
import type { TaskToolkit } from "./toolkit.js";

/** Options for the {@link TaskRunner} constructor. */
export type TaskRunnerOptions = {
  /** When `true`, logs debug notes for refused starts and cancel requests. */
  debug?: boolean;
  /** Defaults to a console logger honouring `debug`. */
  logger?: Logger;
};

type ActiveRun = {
  runId: number;
  spec: TaskSpec;
  abortController: AbortController;
  startedAt: number;
};

/**
 * Runs at most one document task at a time. Handles start, cooperative cancellation and
 * the conversion of every task outcome into exactly one terminal event.
 *
 * The runner does not return to idle on its own: whoever consumes the event channel calls
 * {@link release} after seeing `"done"` or `"error"`.
 *
 * @example
 * ```ts
 * const channel = new EventChannel();
 * const runner = new TaskRunner(createDefaultToolkit());
 * const spec = createTaskSpec("extract", { file: "in.pdf", ranges: "1-3" }, { config, channel });
 *
 * runner.start(spec);
 * const monitor = new TaskMonitor(channel, { runner });
 * monitor.start();
 * ```
 */
export class TaskRunner {
  private active: ActiveRun | undefined;
  private nextRunId = 1;
  private debug: boolean;
  private logger: Logger;

  constructor(
    private readonly toolkit: TaskToolkit,
    options: TaskRunnerOptions = {},
  ) {
    this.debug = options.debug ?? false;
    this.logger = options.logger ?? createConsoleLogger({ debug: this.debug });
  }

  /**
   * Start a task in the background. The algorithm begins on the next turn of the event
   * loop; progress arrives through `spec.channel`.
   *
   * @throws {AlreadyRunningError} While another run is active. The active run is untouched.
   */
  start(spec: TaskSpec): TaskHandle {
    if (this.active) {
      if (this.debug) {
        this.logger.debug(`Refusing "${spec.kind}": "${this.active.spec.kind}" is running`);
      }
      throw new AlreadyRunningError(this.active.spec.kind);
    }

    const abortController = new AbortController();
    const runId = this.nextRunId++;
    this.active = { runId, spec, abortController, startedAt: Date.now() };

    const ctx = createTaskContext(spec.kind, spec.channel, abortController.signal, this.logger);
    const finished = this.runTask(spec, ctx);

    return { runId, kind: spec.kind, signal: abortController.signal, finished };
  }

  /**
   * Ask the active task to stop at its next unit boundary. Returns immediately; the task
   * reports back with a terminal event. No-op when idle or already cancelling.
   */
  cancel(): void {
    const run = this.active;
    if (!run || run.abortController.signal.aborted) return;

    run.abortController.abort();
    if (this.debug) this.logger.debug(`Cancel requested for "${run.spec.kind}" (run ${run.runId})`);
  }

  isRunning(): boolean {
    return this.active !== undefined;
  }

  getState(): RunnerState {
    const run = this.active;
    if (!run) return { status: "idle" };
    return {
      status: "running",
      runId: run.runId,
      kind: run.spec.kind,
      startedAt: run.startedAt,
      canceling: run.abortController.signal.aborted,
    };
  }

  /**
   * Return to idle after the consumer has seen the terminal event. When `runId` is given
   * and does not match the active run, nothing happens.
   */
  release(runId?: number): void {
    if (!this.active) return;
    if (runId !== undefined && runId !== this.active.runId) return;
    this.active = undefined;
  }

  private async runTask(spec: TaskSpec, ctx: TaskContext): Promise<TaskOutcome> {
    // Yield first so start() returns before the algorithm emits anything
    await Promise.resolve();

    try {
      const result = await runAlgorithm(spec, ctx, this.toolkit);

      if (result.status === "completed" && result.outputPath && spec.params.preview) {
        await openQuietly(this.toolkit.opener, result.outputPath, this.logger);
      }

      spec.channel.send({ type: "done", channel: spec.kind });
      return result;
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(`Task "${spec.kind}" failed:`, error);
      spec.channel.send({ type: "error", channel: spec.kind, message });
      return { status: "error", message };
    }
  }
}
