import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import { toReplyFailure, type ConversationOrchestrator } from "../../modules/chat/orchestrator.js";
import type { FailureKind, ReplyFailure } from "../../modules/chat/types.js";
import { MAX_RESULTS_CEILING } from "../../modules/literature/query.js";
import { logError, logInfo } from "../../observability/logger.js";
import { recordErrorRate } from "../../observability/metrics.js";
import { getPipeline } from "../../pipeline.js";

export type LiteratureOrchestratorPort = Pick<
  ConversationOrchestrator,
  "search" | "ask" | "lookupArticle" | "recentSearches"
>;

export interface LiteratureRoutesDependencies {
  getOrchestrator?: () => LiteratureOrchestratorPort;
}

const optionalFilter = z
  .string()
  .nullable()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const searchBodySchema = z.object({
  conversation_id: z.string().trim().min(1, "conversation_id is required"),
  query: z.string().trim().min(1, "query is required").max(1000, "query is too long"),
  max_results: z.number().int().min(1).max(MAX_RESULTS_CEILING).optional(),
  date_from: optionalFilter,
  date_to: optionalFilter,
  journal: optionalFilter
});

const askBodySchema = z.object({
  conversation_id: z.string().trim().min(1, "conversation_id is required"),
  question: z.string().trim().min(1, "question is required").max(2000, "question is too long")
});

const articleParamsSchema = z.object({
  pmid: z.string().regex(/^\d+$/, "pmid must be numeric")
});

const recentQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10)
});

const FAILURE_STATUS: Record<FailureKind, number> = {
  malformed_query: 400,
  quota_exceeded: 429,
  transient: 503,
  internal: 500
};

const toValidationError = (error: z.ZodError, location: "body" | "path" | "query") => ({
  detail: error.issues.map((issue) => ({
    type: issue.code,
    loc: [location, ...issue.path],
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

const sendFailure = (reply: FastifyReply, failure: ReplyFailure) =>
  reply.code(FAILURE_STATUS[failure.kind]).send({ detail: failure.userMessage, kind: failure.kind });

export async function registerLiteratureRoutes(
  app: FastifyInstance,
  dependencies?: LiteratureRoutesDependencies
): Promise<void> {
  const getOrchestrator = dependencies?.getOrchestrator ?? (() => getPipeline().orchestrator);

  app.post("/api/search", async (request, reply) => {
    const parsed = searchBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(422).send(toValidationError(parsed.error, "body"));
    }

    const body = parsed.data;
    const requestId = resolveRequestId(request);
    const filters = {
      ...(body.date_from ? { dateFrom: body.date_from } : {}),
      ...(body.date_to ? { dateTo: body.date_to } : {}),
      ...(body.journal ? { journal: body.journal } : {})
    };
    const result = await getOrchestrator().search({
      conversationId: body.conversation_id,
      text: body.query,
      maxResults: body.max_results,
      filters: Object.keys(filters).length > 0 ? filters : undefined,
      requestId
    });

    if (result.failure) {
      return sendFailure(reply, result.failure);
    }

    logInfo("api.search.replied", { requestId, conversationId: body.conversation_id }, {
      status: result.status,
      article_count: result.articleCount,
      cached: result.cached
    });
    return reply.send({
      status: result.status,
      messages: result.messages,
      article_count: result.articleCount,
      omitted: {
        dropped_records: result.omitted.droppedRecords,
        unavailable_summaries: result.omitted.unavailableSummaries,
        unranked_articles: result.omitted.unrankedArticles
      },
      cached: result.cached,
      ...(result.answer !== undefined ? { answer: result.answer } : {})
    });
  });

  app.post("/api/ask", async (request, reply) => {
    const parsed = askBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(422).send(toValidationError(parsed.error, "body"));
    }

    const result = await getOrchestrator().ask({
      conversationId: parsed.data.conversation_id,
      question: parsed.data.question,
      requestId: resolveRequestId(request)
    });

    if (result.failure) {
      return sendFailure(reply, result.failure);
    }
    return reply.send({ status: result.status, messages: result.messages, sources: result.sources });
  });

  app.get("/api/articles/:pmid", async (request, reply) => {
    const parsed = articleParamsSchema.safeParse(request.params);
    if (!parsed.success) {
      return reply.code(422).send(toValidationError(parsed.error, "path"));
    }

    const requestId = resolveRequestId(request);
    try {
      const article = await getOrchestrator().lookupArticle(parsed.data.pmid, requestId);
      if (!article) {
        return reply.code(404).send({ detail: "Article not found" });
      }
      return reply.send(article);
    } catch (error) {
      const failure = toReplyFailure(error);
      recordErrorRate(`article_lookup_${failure.kind}`);
      logError("api.article_lookup.failed", { requestId }, {
        pmid: parsed.data.pmid,
        failure_kind: failure.kind,
        error: error instanceof Error ? error.message : String(error)
      });
      return sendFailure(reply, failure);
    }
  });

  app.get("/api/searches/recent", async (request, reply) => {
    const parsed = recentQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.code(422).send(toValidationError(parsed.error, "query"));
    }
    return reply.send({ searches: getOrchestrator().recentSearches(parsed.data.limit) });
  });
}
