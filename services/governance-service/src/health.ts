import type { FastifyInstance } from "fastify";
import { config } from "./config";
import { getPool } from "./db";

export type ReadinessProbe = () => Promise<void>;

async function databaseProbe(): Promise<void> {
  if (config.useInMemoryStore) {
    return;
  }
  await getPool().query("SELECT 1");
}

export async function registerHealthRoutes(app: FastifyInstance, probe: ReadinessProbe = databaseProbe): Promise<void> {
  app.get("/health", async () => ({ status: "ok" }));

  app.get("/ready", async (_request, reply) => {
    try {
      await probe();
      return { status: "ready" };
    } catch (error) {
      reply.code(503);
      return { status: "unavailable", message: error instanceof Error ? error.message : String(error) };
    }
  });
}
