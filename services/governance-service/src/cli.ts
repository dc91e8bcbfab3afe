#!/usr/bin/env node
import { runCli } from "./cli/run";
import { createControlPlaneRuntime } from "./control-plane/factory";
import { closePool, migrate } from "./db";
import { createStderrLogger } from "./logger";

const log = createStderrLogger();

async function main(): Promise<number> {
  await migrate(log);
  const runtime = createControlPlaneRuntime({ logger: log });
  try {
    return await runCli(process.argv.slice(2), runtime.controlPlane, {
      stdout: (line) => process.stdout.write(`${line}\n`),
      stderr: (line) => process.stderr.write(`${line}\n`)
    });
  } finally {
    await runtime.close();
    await closePool();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    log.error({ error, traceId: "system" }, "governance-check failed");
    process.exitCode = 1;
  });
