import path from "node:path";
import log from "electron-log/node.js";

log.transports.file.level = "info";
log.transports.file.maxSize = 5 * 1024 * 1024;
log.transports.console.level = process.env.NODE_ENV === "development" ? "debug" : "warn";

/** Points the file transport at `<configDir>/logs/main.log`. */
export const configureLogFile = (configDir: string): string => {
  const filePath = path.join(configDir, "logs", "main.log");
  log.transports.file.resolvePathFn = () => filePath;
  return filePath;
};

export const logger = log;
