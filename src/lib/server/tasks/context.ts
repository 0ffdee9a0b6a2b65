import { setImmediate as nextTurn } from "node:timers/promises";
import type { Logger } from "../../shared/logger.js";
import type { EventSink, TaskChannel } from "../../shared/types.js";

export const CANCELED_MESSAGE = "cancelled by user";

/**
 * Passed to every task algorithm. Wraps the run's event sink and abort signal so the
 * algorithm only ever deals in units of work.
 */
export type TaskContext = {
  channel: TaskChannel;
  /**
   * Emit a progress event. `percent` defaults to `floor(100 * current / total)`, which
   * reaches 100 only on the last unit.
   */
  progress: (current: number, total: number, percent?: number) => void;
  log: (text: string) => void;
  /** Returns `true` once the run has been cancelled. Check this at unit boundaries. */
  isCanceled: () => boolean;
  signal: AbortSignal;
  logger: Logger;
};

export function createTaskContext(
  channel: TaskChannel,
  sink: EventSink,
  signal: AbortSignal,
  logger: Logger,
): TaskContext {
  return {
    channel,
    progress: (current, total, percent = Math.floor((100 * current) / total)) => {
      sink.send({ type: "progress", channel, percent, current, total });
    },
    log: (text) => sink.send({ type: "log", channel, text }),
    isCanceled: () => signal.aborted,
    signal,
    logger,
  };
}

/**
 * Run `work` once per unit, in order. Before each unit the event loop gets a turn, so a
 * pending cancel can land, and the signal is checked; a cancelled run logs
 * {@link CANCELED_MESSAGE} and returns `false`. After each unit `report` is called with the
 * number of units done.
 *
 * @returns `true` when every unit was processed.
 */
export async function eachUnit<T>(
  ctx: TaskContext,
  units: readonly T[],
  work: (unit: T, index: number) => Promise<void>,
  report: (done: number, total: number) => void = (done, total) => ctx.progress(done, total),
): Promise<boolean> {
  for (let index = 0; index < units.length; index++) {
    await nextTurn();
    if (ctx.isCanceled()) {
      ctx.log(CANCELED_MESSAGE);
      return false;
    }
    await work(units[index], index);
    report(index + 1, units.length);
  }
  return true;
}

/** `[0, 1, ..., count - 1]` */
export const indices = (count: number): number[] => Array.from({ length: count }, (_, i) => i);
