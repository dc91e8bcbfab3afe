import Fastify from "fastify";
import { registerRoutes } from "./api/routes";
import { config } from "./config";
import { createControlPlaneRuntime } from "./control-plane/factory";
import { closePool, migrate } from "./db";
import { registerHealthRoutes } from "./health";
import { logger } from "./logger";
import { startTelemetry, stopTelemetry } from "./telemetry";
import { createTierPolicyLoader } from "./tiers/loader";
import { getTraceIdFromRequest } from "./trace/trace";

const app = Fastify({ logger: false });
const runtime = createControlPlaneRuntime({
  tierPolicy: createTierPolicyLoader({ policyPath: config.tierPolicyPath, handleSignals: true })
});

async function start(): Promise<void> {
  await startTelemetry();
  app.addHook("onRequest", (request, reply, done) => {
    reply.header("x-trace-id", getTraceIdFromRequest(request));
    done();
  });
  await migrate();
  await registerHealthRoutes(app);
  await registerRoutes(app, runtime);

  await app.listen({ port: config.port, host: "0.0.0.0" });
  logger.info({ port: config.port, traceId: "system" }, "Governance service listening");
}

async function shutdown(): Promise<void> {
  logger.info({ traceId: "system" }, "Shutting down governance service");
  await app.close();
  await runtime.close();
  await closePool();
  await stopTelemetry();
}

process.on("SIGINT", () => void shutdown());
process.on("SIGTERM", () => void shutdown());

start().catch((error) => {
  logger.error({ error, traceId: "system" }, "Failed to start governance service");
  process.exit(1);
});
