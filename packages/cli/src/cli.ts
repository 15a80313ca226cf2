/**
 * CLI argument parsing and dispatch
 * Main dispatcher - re-exports from cli/ subdirectory
 */

export {
  VERSION,
  showHelp,
  parseArgs,
  runCli,
  exitCodeFor,
} from "./cli/index.js";
