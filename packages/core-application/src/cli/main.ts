#!/usr/bin/env node
import { ConfigError } from "../application/errors.js";
import { buildProgram, configFromCli, run, type CliOptions } from "./program.js";

async function main() {
  const program = buildProgram();
  program.parse(process.argv);

  try {
    const config = configFromCli(program.opts<CliOptions>(), process.env);
    process.exitCode = await run(config);
  } catch (e) {
    if (!(e instanceof ConfigError)) throw e;
    console.error(`ERROR: ${e.message}`);
    for (const issue of e.issues) console.error(`  - ${issue}`);
    process.exitCode = 1;
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
