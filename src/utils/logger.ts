import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LEVEL_COLOR: Record<Exclude<LogLevel, "silent">, chalk.Chalk> = {
  debug: chalk.gray,
  info: chalk.green,
  warn: chalk.yellow,
  error: chalk.red,
};

const isLogLevel = (value: string): value is LogLevel =>
  Object.prototype.hasOwnProperty.call(LEVEL_WEIGHT, value);

const currentLevel = (): LogLevel => {
  const level = (process.env.LOG_LEVEL || "info").toLowerCase();
  return isLogLevel(level) ? level : "info";
};

const formatMeta = (meta: unknown): string => {
  if (meta instanceof Error) {
    return meta.stack || meta.message;
  }
  if (typeof meta === "string") {
    return meta;
  }
  try {
    return JSON.stringify(meta);
  } catch {
    return String(meta);
  }
};

const write = (
  level: Exclude<LogLevel, "silent">,
  message: string,
  meta: unknown[]
): void => {
  if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[currentLevel()]) {
    return;
  }

  const line = [
    chalk.gray("[") + chalk.gray(new Date().toISOString()) + chalk.gray("]"),
    LEVEL_COLOR[level](level.toUpperCase().padEnd(5)),
    message,
    ...meta.map(formatMeta),
  ].join(" ");

  if (level === "error" || level === "warn") {
    console.error(line);
  } else {
    console.log(line);
  }
};

export const logger = {
  debug: (message: string, ...meta: unknown[]) => write("debug", message, meta),
  info: (message: string, ...meta: unknown[]) => write("info", message, meta),
  warn: (message: string, ...meta: unknown[]) => write("warn", message, meta),
  error: (message: string, ...meta: unknown[]) => write("error", message, meta),
};
