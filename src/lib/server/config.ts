import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import * as v from "valibot";
import { errorMessage } from "../shared/errors.js";
import { createConsoleLogger, type Logger } from "../shared/logger.js";

export const DEFAULT_CONFIG_FILE = "pdf-taskkit.config.json";

export const ToolkitConfigSchema = v.object({
  /** Folder that receives generated files. Relative paths resolve against the working directory. */
  resultFolder: v.optional(v.pipe(v.string(), v.trim(), v.nonEmpty()), "results"),
  debug: v.optional(v.boolean(), false),
});

export type ToolkitConfig = v.InferOutput<typeof ToolkitConfigSchema>;

export type LoadConfigOptions = {
  /** @default process.env */
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
};

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

async function readConfigFile(file: string, logger: Logger): Promise<unknown> {
  try {
    return JSON.parse(await readFile(file, "utf-8"));
  } catch (error) {
    if (!isMissingFile(error)) {
      logger.warn(`Ignoring unreadable config ${file}: ${errorMessage(error)}`);
    }
    return {};
  }
}

/**
 * Read the configuration from `file`, fill defaults, then apply `PDF_TASKKIT_RESULT_FOLDER`
 * and `PDF_TASKKIT_DEBUG` from the environment. A missing file gives the defaults; an
 * unreadable or invalid one logs a warning and gives the defaults.
 */
export async function loadConfig(
  file: string = DEFAULT_CONFIG_FILE,
  options: LoadConfigOptions = {},
): Promise<ToolkitConfig> {
  const { env = process.env, logger = createConsoleLogger() } = options;

  const parsed = v.safeParse(ToolkitConfigSchema, await readConfigFile(file, logger));
  if (!parsed.success) {
    const issues = parsed.issues.map((issue) => issue.message).join("; ");
    logger.warn(`Ignoring invalid config ${file}: ${issues}`);
  }
  const config = parsed.success ? parsed.output : v.parse(ToolkitConfigSchema, {});

  const folder = env.PDF_TASKKIT_RESULT_FOLDER?.trim();
  const debug = env.PDF_TASKKIT_DEBUG?.trim();
  return {
    resultFolder: path.resolve(folder || config.resultFolder),
    debug: debug ? debug === "1" || debug === "true" : config.debug,
  };
}

export async function saveConfig(config: ToolkitConfig, file: string = DEFAULT_CONFIG_FILE): Promise<void> {
  await writeFile(file, `${JSON.stringify(config, null, 4)}\n`, "utf-8");
}

export async function ensureResultFolder(config: ToolkitConfig): Promise<void> {
  await mkdir(config.resultFolder, { recursive: true });
}
