#!/usr/bin/env node
import path from "node:path";
import process from "node:process";
import cliProgress from "cli-progress";
import { TaskMonitor } from "../lib/client/monitor.js";
import { EventChannel } from "../lib/server/channel.js";
import { ensureResultFolder, loadConfig } from "../lib/server/config.js";
import { TaskRunner } from "../lib/server/runner.js";
import { createTaskSpec } from "../lib/server/task-spec.js";
import { createDefaultToolkit } from "../lib/server/toolkit.js";
import { ValidationError } from "../lib/shared/errors.js";
import { createConsoleLogger } from "../lib/shared/logger.js";
import type { TaskSpec, TerminalEvent } from "../lib/shared/types.js";
import { ArgumentError, HELP, parseArgs, type CliOptions, type ParsedArgs } from "./args.js";

const UNITS: Record<CliOptions["command"], string> = {
  search: "pages",
  number: "pages",
  merge: "files",
  extract: "pages",
  convert: "lines",
};

/**
 * Runs one task to its terminal event while drawing its progress.
 *
 * @returns The process exit code.
 */
const run = async (options: CliOptions): Promise<number> => {
  const loaded = await loadConfig(options.configFile, {
    logger: createConsoleLogger({ debug: options.debug }),
  });
  const config = {
    resultFolder: options.outFolder ? path.resolve(options.outFolder) : loaded.resultFolder,
    debug: options.debug || loaded.debug,
  };
  const logger = createConsoleLogger({ debug: config.debug });

  const channel = new EventChannel();
  let spec: TaskSpec;
  try {
    spec = createTaskSpec(options.command, options.params, { config, channel });
  } catch (error) {
    if (!(error instanceof ValidationError)) throw error;
    for (const issue of error.issues) console.error(`Error: ${issue}`);
    return 1;
  }
  await ensureResultFolder(config);

  const runner = new TaskRunner(createDefaultToolkit(), { debug: config.debug, logger });
  const bars = new cliProgress.MultiBar(
    {
      clearOnComplete: false,
      hideCursor: true,
      format: `${options.command} {bar} {percentage}% | {done}/{units} ${UNITS[options.command]}`,
    },
    cliProgress.Presets.shades_grey,
  );
  const bar = bars.create(100, 0, { done: 0, units: 0 });

  let settle: (event: TerminalEvent) => void = () => {};
  const terminal = new Promise<TerminalEvent>((resolve) => {
    settle = resolve;
  });

  const monitor = new TaskMonitor(channel, {
    runner,
    onEvent: (event) => {
      if (event.type === "progress") bar.update(event.percent, { done: event.current, units: event.total });
      if (event.type === "log") bars.log(`${event.text}\n`);
    },
    onTerminal: (event) => settle(event),
  });

  const onInterrupt = () => {
    bars.log("cancelling...\n");
    runner.cancel();
  };
  process.once("SIGINT", onInterrupt);

  monitor.reset(options.command);
  const handle = runner.start(spec);
  monitor.start();

  const event = await terminal;
  monitor.stop();
  bars.stop();
  process.off("SIGINT", onInterrupt);
  await handle.finished;

  if (event.type === "error") {
    console.error(`Error: ${event.message}`);
    return 1;
  }
  return 0;
};

const main = async (argv: string[] = process.argv.slice(2)): Promise<number> => {
  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(argv);
  } catch (error) {
    if (!(error instanceof ArgumentError)) throw error;
    console.error(`Error: ${error.message}`);
    console.log(HELP);
    return 1;
  }

  if (parsed.type === "help") {
    console.log(HELP);
    return 0;
  }
  return run(parsed.options);
};

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  },
);
