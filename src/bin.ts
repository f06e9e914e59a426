#!/usr/bin/env node
import { run } from "./cli.js";
import { loadConfig } from "./config.js";

const config = loadConfig(process.env, process.stdout.isTTY === true);

try {
  const result = await run(process.argv.slice(2), config);
  if (result.exitCode === 0) {
    console.log(result.output);
  } else {
    console.error(result.output);
  }
  process.exitCode = result.exitCode;
} catch (err) {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
}
