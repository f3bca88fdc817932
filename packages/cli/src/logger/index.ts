// pattern: Imperative Shell

export { createLogger, mapLogLevelToPinoLevel } from "./config.js";
export { CLI_LOGGER, initializeLogger, setCliLogLevel } from "./instance.js";
export { formatLogObject } from "./renderer.js";
export type { LogFormat, LogLevel } from "./types.js";
export { LOG_FORMATS, LOG_LEVELS } from "./types.js";
