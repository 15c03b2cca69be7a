import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import { ConfigurationInvalidError, serializeError } from "../../errors.js";
import { toFinalAnswerJson } from "../../modules/aggregation/serialize.js";
import { createQueryOrchestrator } from "../../modules/query/create-query-orchestrator.js";
import type { QueryOrchestrator } from "../../modules/query/query-orchestrator.js";
import { logError } from "../../observability/logger.js";
import { recordErrorRate } from "../../observability/metrics.js";

const queryBodySchema = z.object({
  query: z
    .string({ required_error: "query is required" })
    .refine((value) => value.trim().length > 0, "query must not be blank")
});

const toValidationError = (error: z.ZodError) => ({
  detail: error.issues.map((issue) => ({
    type: issue.code,
    loc: ["body", ...issue.path],
    msg: issue.message
  }))
});

const resolveRequestId = (request: FastifyRequest): string => {
  const headerRequestId = request.headers["x-request-id"];
  if (typeof headerRequestId === "string" && headerRequestId.trim().length > 0) {
    return headerRequestId.trim();
  }
  return request.id;
};

export type QueryProcessor = Pick<QueryOrchestrator, "processQuery">;

export interface QueryRoutesDependencies {
  createOrchestrator?: () => Promise<QueryProcessor>;
}

const buildQueryHandler = (dependencies?: QueryRoutesDependencies) => {
  const createOrchestrator = dependencies?.createOrchestrator ?? createQueryOrchestrator;
  let orchestrator: Promise<QueryProcessor> | null = null;

  const resolveOrchestrator = (): Promise<QueryProcessor> => {
    if (!orchestrator) {
      orchestrator = createOrchestrator().catch((error: unknown) => {
        orchestrator = null;
        throw error;
      });
    }
    return orchestrator;
  };

  return async (request: FastifyRequest, reply: FastifyReply): Promise<void> => {
    const requestId = resolveRequestId(request);
    const parsed = queryBodySchema.safeParse(request.body);
    if (!parsed.success) {
      recordErrorRate("validation_422");
      reply.code(422).send(toValidationError(parsed.error));
      return;
    }

    try {
      const processor = await resolveOrchestrator();
      const answer = await processor.processQuery(parsed.data.query, { requestId });
      reply.code(200).send(toFinalAnswerJson(answer));
    } catch (error) {
      if (error instanceof ConfigurationInvalidError) {
        recordErrorRate("query_configuration_invalid");
        logError("query.route.configuration_invalid", { requestId }, serializeError(error));
        reply.code(500).send({ detail: error.message, issues: error.issues });
        return;
      }
      recordErrorRate("query_route_exception");
      logError("query.route.failed", { requestId }, serializeError(error));
      reply.code(500).send({ detail: "Query processing failed." });
    }
  };
};

export async function registerQueryRoutes(app: FastifyInstance, dependencies?: QueryRoutesDependencies): Promise<void> {
  app.post("/query", buildQueryHandler(dependencies));
}
