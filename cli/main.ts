import { readFile } from "node:fs/promises";
import { appLogger } from "../services/appLogger";
import { runCli } from "./dcisCli";

runCli(process.argv.slice(2), {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
  readFile: (path) => readFile(path, "utf8"),
  env: process.env,
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    appLogger.error("cli_crashed", { error: error instanceof Error ? error.message : String(error) });
    process.exitCode = 1;
  });
