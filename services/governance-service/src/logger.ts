import pino, { type Logger } from "pino";
import { config } from "./config";

const options = {
  name: config.serviceName,
  level: config.logLevel,
  base: { service: config.serviceName }
};

export const logger = pino(options);

/** Logger for the CLI, whose stdout carries the decision JSON. */
export function createStderrLogger(): Logger {
  return pino(options, pino.destination(2));
}
