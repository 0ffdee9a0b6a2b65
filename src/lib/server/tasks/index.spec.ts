import { describe, it, expect } from "vitest";
import { createHarness, percents } from "../../../test/harness.js";
import { TASK_KINDS, type TaskKind } from "../../shared/types.js";

const PARAMS: Record<TaskKind, unknown> = {
  search: { file: "/in/doc.pdf", queries: ["page"] },
  number: { file: "/in/doc.pdf" },
  merge: { files: ["/in/doc.pdf", "/in/doc.pdf"] },
  extract: { file: "/in/doc.pdf", ranges: "1-2" },
  convert: { file: "/in/doc.pdf" },
};

const setup = () => {
  const harness = createHarness();
  harness.workspace.addPdf("/in/doc.pdf", ["page one", "page two"]);
  return harness;
};

describe("task algorithms", () => {
  it.each(TASK_KINDS)("%s ends with exactly one done and reaches 100%%", async (kind) => {
    const { run } = setup();

    const { outcome, events } = await run(kind, PARAMS[kind]);
    const progress = percents(events);

    expect(outcome.status).toBe("completed");
    expect(events.filter((event) => event.type === "done" || event.type === "error")).toEqual([
      { type: "done", channel: kind },
    ]);
    expect(events.at(-1)).toEqual({ type: "done", channel: kind });
    expect(events.every((event) => event.channel === kind)).toBe(true);
    expect(progress.at(-1)).toBe(100);
    expect(progress).toEqual([...progress].sort((a, b) => a - b));
  });

  it.each(TASK_KINDS)("%s writes nothing when cancelled right after start", async (kind) => {
    const { workspace, channel, runner, spec } = setup();

    const handle = runner.start(spec(kind, PARAMS[kind]));
    runner.cancel();
    const outcome = await handle.finished;
    const events = channel.drain();

    expect(outcome).toEqual({ status: "canceled" });
    expect(events).toContainEqual({ type: "log", channel: kind, text: "cancelled by user" });
    expect(events.at(-1)).toEqual({ type: "done", channel: kind });
    expect(percents(events)).not.toContain(100);
    expect(workspace.paths).toEqual(["/in/doc.pdf"]);
    expect(workspace.openDocuments).toBe(0);
  });
});
