import { TASK_KINDS, type TaskKind } from "../lib/shared/types.js";

export class ArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ArgumentError";
  }
}

export type CliOptions = {
  command: TaskKind;
  /** Raw task parameters, validated later by `createTaskSpec`. Only flags given are set. */
  params: Record<string, unknown>;
  configFile?: string;
  outFolder?: string;
  debug: boolean;
};

export type ParsedArgs = { type: "help" } | { type: "run"; options: CliOptions };

const INTEGER = /^[+-]?\d+$/;

const isTaskKind = (value: string): value is TaskKind =>
  TASK_KINDS.some((kind) => kind === value);

/**
 * Parses `<command> [files...] [options]` into a task kind and raw parameters.
 *
 * @throws {ArgumentError} On an unknown command or flag, a flag missing its value, or a
 * non-integer where an integer is expected.
 */
export const parseArgs = (argv: string[]): ParsedArgs => {
  const [command, ...rest] = argv;
  if (!command || command === "--help" || command === "-h") return { type: "help" };
  if (!isTaskKind(command)) throw new ArgumentError(`Unknown command "${command}"`);

  const params: Record<string, unknown> = {};
  const files: string[] = [];
  const queries: string[] = [];
  let configFile: string | undefined;
  let outFolder: string | undefined;
  let debug = false;

  const valueOf = (flag: string, index: number): string => {
    const next = rest[index + 1];
    if (next === undefined) throw new ArgumentError(`${flag} expects a value`);
    return next;
  };

  const integerOf = (flag: string, index: number): number => {
    const raw = valueOf(flag, index);
    if (!INTEGER.test(raw.trim())) throw new ArgumentError(`${flag} expects an integer, got "${raw}"`);
    return Number.parseInt(raw, 10);
  };

  for (let i = 0; i < rest.length; i += 1) {
    const arg = rest[i];
    switch (arg) {
      case "--help":
      case "-h":
        return { type: "help" };
      case "--config":
        configFile = valueOf(arg, i);
        i += 1;
        break;
      case "--out":
        outFolder = valueOf(arg, i);
        i += 1;
        break;
      case "--open":
        params.preview = true;
        break;
      case "--debug":
        debug = true;
        break;
      case "--text":
      case "-t":
        queries.push(valueOf(arg, i));
        i += 1;
        break;
      case "--case-sensitive":
        params.caseSensitive = true;
        break;
      case "--all":
        params.requireAll = true;
        break;
      case "--start-number":
        params.startNumber = integerOf(arg, i);
        i += 1;
        break;
      case "--start-page":
        params.startPage = integerOf(arg, i);
        i += 1;
        break;
      case "--initial":
        params.useInitial = true;
        break;
      case "--no-initial":
        params.useInitial = false;
        break;
      case "--x":
        params.x = integerOf(arg, i);
        i += 1;
        break;
      case "--y":
        params.y = integerOf(arg, i);
        i += 1;
        break;
      case "--prefix":
        params.prefix = valueOf(arg, i);
        i += 1;
        break;
      case "--output":
      case "-o":
        params.outputName = valueOf(arg, i);
        i += 1;
        break;
      case "--pages":
      case "-p":
        params.ranges = valueOf(arg, i);
        i += 1;
        break;
      default:
        if (arg.startsWith("-")) throw new ArgumentError(`Unknown option "${arg}"`);
        files.push(arg);
        break;
    }
  }

  if (command === "merge") {
    params.files = files;
  } else {
    if (files.length > 1) throw new ArgumentError(`${command} takes a single PDF file`);
    params.file = files[0] ?? "";
  }
  if (command === "search") params.queries = queries;

  return { type: "run", options: { command, params, configFile, outFolder, debug } };
};

export const HELP = `
pdf-taskkit <command> [files...] [options]

Commands:
  search <file> -t <text> [-t <text> ...]   Keep the pages containing the texts
  number <file>                            Stamp page numbers
  merge <file> <file> ...                  Join PDFs into <name>_unido.pdf
  extract <file> -p <ranges>               Copy selected pages, e.g. "1-3,6"
  convert <file>                           Write the text as a .docx document

Search options:
  -t, --text <text>        Text to look for (up to three)
      --case-sensitive     Match case exactly
      --all                Require every text on the page (default: any)

Number options:
      --start-number <n>   First label (default 1)
      --start-page <n>     First page to number, 1-based (default 1)
      --initial            Count from --start-number (default)
      --no-initial         Use each page's own position as its label
      --x <n>, --y <n>     Offset from the bottom-left corner (default 50, 50)
      --prefix <text>      Text before the label (default "Page ")

Merge options:
  -o, --output <name>      Output name, "_unido.pdf" is appended (default "merged")

Extract options:
  -p, --pages <ranges>     Comma-separated pages and ranges

Common options:
      --out <folder>       Result folder (overrides the config file)
      --config <file>      Config file (default pdf-taskkit.config.json)
      --open               Open the result when done
      --debug              Print debug messages
  -h, --help               Show this help message

Press Ctrl+C once to cancel a running task.
`;
