import { errorMessage } from "../shared/errors.js";
import { silentLogger, type Logger } from "../shared/logger.js";
import type { EventSource, TaskChannel, TaskEvent, TerminalEvent } from "../shared/types.js";

/** What a display shows for one operation. */
export type ChannelView = {
  percent: number;
  current: number;
  total: number;
  /** Log lines in arrival order. */
  log: string[];
};

export type MonitorStatus = "idle" | "running" | "done" | "error";

/** Options for {@link TaskMonitor}. */
export type TaskMonitorOptions = {
  /** Milliseconds between polls once {@link TaskMonitor.start} is called. @default 150 */
  interval?: number;
  /** Released when a terminal event is seen, returning the runner to idle. */
  runner?: { release: () => void };
  /** Receives every log event as `[channel] text`, and errors. Silent by default. */
  logger?: Logger;
  /** Called for every event after it has been applied. */
  onEvent?: (event: TaskEvent) => void;
  /** Called once per terminal event, after the runner has been released. */
  onTerminal?: (event: TerminalEvent) => void;
};

const emptyView = (): ChannelView => ({ percent: 0, current: 0, total: 0, log: [] });

/**
 * Polls an event channel and folds what it finds into per-channel display state. The
 * consumer half of the runner protocol: it, not the runner, notices that a run has ended
 * and calls `runner.release()`.
 *
 * @example
 * ```ts
 * const monitor = new TaskMonitor(channel, {
 *   runner,
 *   onEvent: () => render(monitor.view("merge")),
 *   onTerminal: () => monitor.stop(),
 * });
 * monitor.reset("merge");
 * runner.start(spec);
 * monitor.start();
 * ```
 */
export class TaskMonitor {
  /** Channel tag to its current view. Channels appear on their first event or reset. */
  readonly channels = new Map<TaskChannel, ChannelView>();
  status: MonitorStatus = "idle";
  /** Message of the most recent error event. */
  lastError: string | undefined;
  private timer: ReturnType<typeof setInterval> | undefined;
  private interval: number;
  private logger: Logger;

  constructor(
    private readonly source: EventSource,
    private readonly options: TaskMonitorOptions = {},
  ) {
    this.interval = options.interval ?? 150;
    this.logger = options.logger ?? silentLogger;
  }

  /** `true` while the polling timer is active. */
  get polling(): boolean {
    return this.timer !== undefined;
  }

  /** Integer mean of every channel with non-zero progress, or 0. */
  get overallPercent(): number {
    const active = [...this.channels.values()].map((view) => view.percent).filter((p) => p > 0);
    if (active.length === 0) return 0;
    return Math.floor(active.reduce((sum, p) => sum + p, 0) / active.length);
  }

  view(channel: TaskChannel): ChannelView {
    let view = this.channels.get(channel);
    if (!view) {
      view = emptyView();
      this.channels.set(channel, view);
    }
    return view;
  }

  /** Clear one channel's view and mark the monitor as running. Call when starting a run. */
  reset(channel: TaskChannel): void {
    this.channels.set(channel, emptyView());
    this.status = "running";
    this.lastError = undefined;
  }

  /** Drain the source once and apply every event in order. */
  poll(): TaskEvent[] {
    const events = this.source.drain();
    for (const event of events) {
      this.apply(event);
      this.notify(() => this.options.onEvent?.(event));
    }
    return events;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.poll(), this.interval);
  }

  stop(): void {
    clearInterval(this.timer);
    this.timer = undefined;
  }

  private apply(event: TaskEvent): void {
    const view = this.view(event.channel);

    switch (event.type) {
      case "progress":
        view.percent = event.percent;
        view.current = event.current;
        view.total = event.total;
        break;
      case "log":
        view.log.push(event.text);
        this.logger.info(`[${event.channel}] ${event.text}`);
        break;
      case "done":
        this.status = "done";
        this.finish(event);
        break;
      case "error":
        this.status = "error";
        this.lastError = event.message;
        this.logger.error(`Error: ${event.message}`);
        this.finish(event);
        break;
    }
  }

  private finish(event: TerminalEvent): void {
    this.options.runner?.release();
    this.notify(() => this.options.onTerminal?.(event));
  }

  private notify(callback: () => void): void {
    try {
      callback();
    } catch (error) {
      this.logger.error(`Error in monitor callback: ${errorMessage(error)}`);
    }
  }
}
