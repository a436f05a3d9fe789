import { Hono, type Context } from "hono";
import { z } from "zod";
import type { CollectionOrchestrator } from "../collection/orchestrator.js";
import type { TaskQueueProcessor } from "../processing/processor.js";
import { parseTask, TASK_KINDS } from "../processing/tasks.js";
import type { StoreHandle } from "../store/types.js";
import { ValidationFailedError, type ValidationIssue } from "../utils/errors.js";
import { BadRequestError, NotFoundError, toErrorResponse } from "./errors.js";

export interface ApiDeps {
  orchestrator: CollectionOrchestrator;
  processor: TaskQueueProcessor;
  store: StoreHandle;
  version?: string;
}

const collectBodySchema = z.object({
  owner: z.string().trim().min(1),
  repo: z.string().trim().min(1),
});

const processBatchBodySchema = z.object({
  kind: z.enum(TASK_KINDS),
  items: z.array(z.unknown()).min(1),
});

const rulesQuerySchema = z.object({
  repositoryId: z.coerce.number().int().positive().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

const validityBodySchema = z.object({ isValid: z.boolean() });
const ruleIdSchema = z.coerce.number().int().positive();
const cleanupBodySchema = z.object({ days: z.number().int().positive().optional() });

export function createApp(deps: ApiDeps): Hono {
  const app = new Hono();

  app.get("/health", (c) =>
    c.json({
      status: "ok",
      version: deps.version ?? "0.1.0",
      store: deps.store.kind,
      timestamp: new Date().toISOString(),
    })
  );

  app.route("/api", createApiRouter(deps));
  app.onError((err, c) => toErrorResponse(c, err));
  return app;
}

export function createApiRouter({ orchestrator, processor, store }: ApiDeps): Hono {
  const api = new Hono();

  api.post("/collect", async (c) => {
    const { owner, repo } = collectBodySchema.parse(await readJsonBody(c));
    return c.json(await orchestrator.collectRepositoryData(owner, repo));
  });

  api.post("/process-batch", async (c) => {
    const { kind, items } = processBatchBodySchema.parse(await readJsonBody(c));

    // Reject the whole batch up front rather than counting bad items as task errors
    const issues: ValidationIssue[] = [];
    items.forEach((item, index) => {
      try {
        parseTask(kind, item);
      } catch (err) {
        if (!(err instanceof ValidationFailedError)) throw err;
        for (const issue of err.issues) {
          issues.push({ path: `items.${index}.${issue.path}`, message: issue.message });
        }
      }
    });
    if (issues.length > 0) {
      throw new ValidationFailedError(`Invalid ${kind} items`, issues);
    }

    return c.json(await processor.processBatch(items, kind));
  });

  api.get("/processing/stats", (c) => c.json(processor.getProcessingStats()));

  api.get("/collection/status", async (c) => c.json(await orchestrator.getCollectionStatus()));

  api.get("/sync/progress", (c) => c.json(orchestrator.getProgress()));

  api.get("/rules", async (c) => {
    const query = rulesQuerySchema.parse({
      repositoryId: c.req.query("repositoryId"),
      limit: c.req.query("limit"),
    });
    const session = await store.openSession();
    try {
      return c.json(await session.listTopRules(query));
    } finally {
      session.release();
    }
  });

  api.patch("/rules/:id/validity", async (c) => {
    const id = ruleIdSchema.parse(c.req.param("id"));
    const { isValid } = validityBodySchema.parse(await readJsonBody(c));
    const session = await store.openSession();
    try {
      const rule = await session.setRuleValidity(id, isValid);
      if (!rule) throw new NotFoundError(`Rule ${id} not found`);
      return c.json(rule);
    } finally {
      session.release();
    }
  });

  api.post("/cleanup", async (c) => {
    const { days } = cleanupBodySchema.parse(await readJsonBody(c));
    return c.json(await orchestrator.cleanupOldData(days));
  });

  return api;
}

/** An empty body reads as `{}`; anything else must be valid JSON. */
async function readJsonBody(c: Context): Promise<unknown> {
  const text = await c.req.text();
  if (!text.trim()) return {};
  try {
    return JSON.parse(text);
  } catch {
    throw new BadRequestError("Request body is not valid JSON");
  }
}
