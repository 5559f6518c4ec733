import { ConsoleLogger, type Logger } from "../../core/logger.js";

export const createCliLogger = (verbose: boolean): Logger => {
  const logger = new ConsoleLogger(verbose ? "debug" : "warn");
  logger.setContext("xml-pathway");
  return logger;
};
