// pattern: Imperative Shell
// Process-wide dependencies shared by commands

export {
  CLI_LOGGER,
  getCliLogger,
  initializeLogger,
  setCliLogLevel,
} from "../logger/index.js";
