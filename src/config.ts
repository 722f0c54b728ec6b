import path from "path";
import { z } from "zod";
import { parseClockTime } from "./tasks/time";
import { formatLogError } from "./utils/error-formatters";

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .refine((value) => ["true", "false", "1", "0", "yes", "no"].includes(value), {
    message: "Expected true/false, 1/0 or yes/no",
  })
  .transform((value) => ["true", "1", "yes"].includes(value));

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

/**
 * Schema for the environment variables the bot reads.
 */
export const envSchema = z.object({
  TELEGRAM_BOT_TOKEN: z.string().trim().min(1, "TELEGRAM_BOT_TOKEN is required"),
  TELEGRAM_CHAT_ID: z.string().trim().min(1, "TELEGRAM_CHAT_ID is required"),
  TASKS_DIRECTORY: z.string().trim().min(1, "TASKS_DIRECTORY is required"),
  TASKS_FILES: optionalString,
  TASKS_EXTENSION: optionalString.pipe(
    z.string().startsWith(".", "TASKS_EXTENSION must start with a dot").default(".md"),
  ),
  DEFAULT_TIME: optionalString.pipe(
    z
      .string()
      .refine((value) => parseClockTime(value) !== null, "DEFAULT_TIME must be a valid HH:MM time")
      .default("09:00"),
  ),
  CHECK_INTERVAL_SECONDS: optionalString.pipe(
    z.coerce.number().int().min(1, "CHECK_INTERVAL_SECONDS must be at least 1").default(60),
  ),
  SHOW_SOURCE: optionalString.pipe(booleanFlag.default("true")),
});

export interface AppConfig {
  botToken: string;
  chatId: string;
  baseDirectory: string;
  files?: string[]; // undefined means scan the directory recursively
  extension: string;
  defaultTime: string;
  checkIntervalSeconds: number;
  showSource: boolean;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function splitList(value: string | undefined): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  const items = value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item !== "");
  return items.length > 0 ? items : undefined;
}

/**
 * Reads and validates the configuration.
 * @throws ConfigError listing every invalid or missing setting
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatLogError(result.error)}`);
  }

  const env = result.data;
  return {
    botToken: env.TELEGRAM_BOT_TOKEN,
    chatId: env.TELEGRAM_CHAT_ID,
    baseDirectory: path.resolve(env.TASKS_DIRECTORY),
    files: splitList(env.TASKS_FILES),
    extension: env.TASKS_EXTENSION,
    defaultTime: env.DEFAULT_TIME,
    checkIntervalSeconds: env.CHECK_INTERVAL_SECONDS,
    showSource: env.SHOW_SOURCE,
  };
}
