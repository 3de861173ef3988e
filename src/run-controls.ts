import { runControlsCli } from "./controls-cli.js";

process.exitCode = await runControlsCli();
