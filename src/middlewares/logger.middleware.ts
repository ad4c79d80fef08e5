import morgan from "morgan";
import chalk from "chalk";
import type { Request, Response } from "express";

const METHOD_COLORS: Record<string, chalk.Chalk> = {
  GET: chalk.green,
  POST: chalk.yellow,
  PUT: chalk.blue,
  DELETE: chalk.red,
  PATCH: chalk.magenta,
};

morgan.token<Request, Response>("timestamp", () =>
  chalk.gray(new Date().toISOString())
);

morgan.token<Request, Response>("colored-method", (req) => {
  const method = req.method;
  return (METHOD_COLORS[method] ?? chalk.white)(method);
});

morgan.token<Request, Response>("colored-status", (_req, res) => {
  const status = res.statusCode;
  if (status >= 500) return chalk.red(status);
  if (status >= 400) return chalk.yellow(status);
  if (status >= 300) return chalk.cyan(status);
  return chalk.green(status);
});

morgan.token<Request, Response>("colored-url", (req) => chalk.cyan(req.originalUrl));

const FORMAT =
  chalk.gray("[") +
  ":timestamp" +
  chalk.gray("]") +
  chalk.white(" REQUEST ") +
  ":colored-method " +
  ":colored-url " +
  ":colored-status " +
  chalk.magenta(":response-time ms") +
  chalk.white(" len=") +
  chalk.cyan(":res[content-length]");

/** Request log line per response; quiet when LOG_LEVEL is silent or above info. */
export const requestLogger = morgan<Request, Response>(FORMAT, {
  skip: () => ["silent", "warn", "error"].includes(process.env.LOG_LEVEL ?? ""),
});
