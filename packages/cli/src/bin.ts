#!/usr/bin/env node
// pattern: Imperative Shell

import { detectNonInteractive, rootCommand } from "./cli/index.js";
import { initializeLogger } from "./logger/index.js";

// Output produced before the preAction hook runs still needs a logger;
// the hook re-initialises it from the flags
const nonInteractive = detectNonInteractive();
initializeLogger(nonInteractive ? "json" : "nice", nonInteractive);

await rootCommand.parseAsync(process.argv);
