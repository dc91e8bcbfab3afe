import type { FastifyInstance, FastifyReply } from "fastify";
import { z } from "zod";
import type { ControlPlane } from "../control-plane/control-plane";
import { AuditWriteFailure, InvalidRequestError } from "../errors";
import { logger } from "../logger";
import type { TierPolicyLoader } from "../tiers/loader";
import { getTraceIdFromRequest, withTraceId } from "../trace/trace";

const auditParamsSchema = z.object({ auditId: z.string().min(1) });
const agentParamsSchema = z.object({ agentId: z.string().trim().min(1) });

export type RouteDeps = {
  controlPlane: ControlPlane;
  tierPolicy: TierPolicyLoader;
};

function knownErrorBody(reply: FastifyReply, error: unknown, traceId: string): Record<string, unknown> | null {
  if (error instanceof InvalidRequestError) {
    reply.code(error.statusCode);
    return { message: error.message, issues: error.issues, traceId };
  }
  if (error instanceof AuditWriteFailure) {
    reply.code(error.statusCode);
    return { message: "Audit record could not be written; retry the request.", auditId: error.auditId, traceId };
  }
  return null;
}

export async function registerRoutes(app: FastifyInstance, deps: RouteDeps): Promise<void> {
  const { controlPlane, tierPolicy } = deps;

  app.post("/v1/actions", async (request, reply) => {
    const traceId = getTraceIdFromRequest(request);
    const log = withTraceId(logger, traceId);
    try {
      const decision = await controlPlane.handleAction(request.body ?? {}, { traceId, logger: log });
      return { ...decision, traceId };
    } catch (error) {
      const body = knownErrorBody(reply, error, traceId);
      if (body) {
        log.warn({ error: error instanceof Error ? error.message : String(error) }, "Action request rejected");
        return body;
      }
      throw error;
    }
  });

  app.get("/v1/audit/:auditId", async (request, reply) => {
    const params = auditParamsSchema.safeParse(request.params);
    if (!params.success) {
      reply.code(400);
      return { message: "Invalid audit id." };
    }
    const trail = await controlPlane.getAuditTrail(params.data.auditId);
    if (!trail) {
      reply.code(404);
      return { message: "Audit record not found." };
    }
    return trail;
  });

  app.get("/v1/budget/:agentId", async (request, reply) => {
    const params = agentParamsSchema.safeParse(request.params);
    if (!params.success) {
      reply.code(400);
      return { message: "Invalid agent id." };
    }
    return controlPlane.budgetReport(params.data.agentId);
  });

  app.post("/v1/budget/:agentId/reset", async (request, reply) => {
    const traceId = getTraceIdFromRequest(request);
    const log = withTraceId(logger, traceId);
    const params = agentParamsSchema.safeParse(request.params);
    if (!params.success) {
      reply.code(400);
      return { message: "Invalid agent id.", traceId };
    }
    try {
      const result = await controlPlane.resetBudget(params.data.agentId, request.body ?? {}, { traceId, logger: log });
      return { ...result, traceId };
    } catch (error) {
      const body = knownErrorBody(reply, error, traceId);
      if (body) {
        return body;
      }
      throw error;
    }
  });

  app.get("/v1/policy/current", async () => {
    const snapshot = tierPolicy.getSnapshot();
    return {
      version: snapshot.info.version,
      hash: snapshot.info.hash,
      loadedAt: snapshot.info.loadedAt,
      path: snapshot.info.path,
      source: snapshot.source
    };
  });
}
