import type { TaskParamsMap } from "./params.js";

/** The five document operations. Doubles as the channel tag on every {@link TaskEvent}. */
export type TaskKind = "search" | "number" | "merge" | "extract" | "convert";

export type TaskChannel = TaskKind;

export const TASK_KINDS: readonly TaskKind[] = ["search", "number", "merge", "extract", "convert"];

/**
 * Notification emitted by a running task.
 *
 * This is a discriminated union on `type`. For one run the sequence is any number of
 * `"progress"` and `"log"` events followed by exactly one `"done"` or `"error"`.
 */
export type TaskEvent =
  | {
      type: "progress";
      /** Operation the event belongs to. Consumers route on it. */
      channel: TaskChannel;
      /** Integer in `[0, 100]`, never decreasing within one run. */
      percent: number;
      /** Units processed so far (pages, files or text lines). */
      current: number;
      total: number;
    }
  | {
      type: "log";
      channel: TaskChannel;
      text: string;
    }
  | {
      type: "done";
      channel: TaskChannel;
    }
  | {
      type: "error";
      channel: TaskChannel;
      message: string;
    };

export type TerminalEvent = Extract<TaskEvent, { type: "done" | "error" }>;

/** Producer side of an event channel. Sending never blocks and never throws. */
export type EventSink = {
  send: (event: TaskEvent) => void;
};

/** Consumer side of an event channel. Returns every queued event in emission order. */
export type EventSource = {
  drain: () => TaskEvent[];
};

type SpecOf<K extends TaskKind> = {
  readonly kind: K;
  readonly params: Readonly<TaskParamsMap[K]>;
  /** Folder that receives generated files. Taken from the configuration at start time. */
  readonly outputFolder: string;
  readonly channel: EventSink;
};

/**
 * Everything a run needs, fixed when the caller starts it. Built by `createTaskSpec`,
 * owned by the runner until the run ends.
 */
export type TaskSpec = { [K in TaskKind]: SpecOf<K> }[TaskKind];

export type TaskSpecOf<K extends TaskKind> = SpecOf<K>;

/** Result returned by a task algorithm. Cancelled runs never carry an output path. */
export type TaskResult = { status: "completed"; outputPath?: string } | { status: "canceled" };

/** How a run ended, as seen through {@link TaskHandle.finished}. */
export type TaskOutcome = TaskResult | { status: "error"; message: string };

/** Returned by `TaskRunner.start`. */
export type TaskHandle = {
  runId: number;
  kind: TaskKind;
  /** Aborted when the run is cancelled. */
  signal: AbortSignal;
  /** Settles once the terminal event has been sent. Never rejects. */
  finished: Promise<TaskOutcome>;
};

export type RunnerState =
  | { status: "idle" }
  | {
      status: "running";
      runId: number;
      kind: TaskKind;
      /** Epoch timestamp (ms) of the start call. */
      startedAt: number;
      /** `true` once cancel has been requested and the task has not reported back yet. */
      canceling: boolean;
    };
