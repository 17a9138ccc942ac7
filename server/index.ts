import { runCli } from "./cli";
import { logError } from "./errors";

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logError(error, "cli");
    process.exitCode = 1;
  }
);
