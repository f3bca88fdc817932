// pattern: Imperative Shell
// Single import point for the CLI's process-wide dependencies

export {
  CLI_LOGGER,
  initializeLogger,
  setCliLogLevel,
} from "../logger/index.js";
