import { Hono, type Context } from "hono";
import { serve, type ServerType } from "@hono/node-server";
import { z } from "zod";
import type { PipelineEngine } from "../pipeline/engine.js";
import { PipelineError, toPipelineError, type PipelineErrorCode } from "../pipeline/errors.js";
import { StageDescriptorInputSchema, normalizeDescriptor } from "../pipeline/registry/schema.js";
import { StageRegistry } from "../pipeline/registry/stageRegistry.js";
import { createLogger } from "../pipeline/logger.js";
import { stateLabel, type StageDescriptor } from "../pipeline/types.js";
import { CapacityExceededError, ConcurrencyLimiter } from "../pipeline/utils/concurrencyLimiter.js";

const SubmitSchema = z.object({
  payloadRef: z.string().min(1)
});

const RequestIdSchema = z.object({
  requestId: z.string().min(1)
});

const AbortSchema = RequestIdSchema.extend({
  reason: z.string().min(1).optional()
});

const StagePatchSchema = StageDescriptorInputSchema.omit({ name: true });

const ResultCallbackSchema = z.discriminatedUnion("status", [
  z.object({
    requestId: z.string().min(1),
    stage: z.string().min(1),
    attempt: z.number().int().positive(),
    status: z.literal("success"),
    outputRef: z.string().min(1)
  }),
  z.object({
    requestId: z.string().min(1),
    stage: z.string().min(1),
    attempt: z.number().int().positive(),
    status: z.literal("failure"),
    error: z.string().min(1),
    retryable: z.boolean().optional()
  })
]);

export type HttpAppOptions = {
  engine: PipelineEngine;
  /** Concurrent submissions admitted by the ingress limiter. */
  maxConcurrentSubmits?: number;
  /** Timeout for waiting in the ingress queue (ms). */
  queueTimeoutMs?: number;
};

export type HttpServerConfig = HttpAppOptions & {
  port: number;
  hostname?: string;
};

const STATUS_BY_CODE: Partial<Record<PipelineErrorCode, 400 | 404 | 409 | 503>> = {
  BAD_REQUEST: 400,
  CONFIGURATION: 400,
  REQUEST_NOT_FOUND: 404,
  STALE_TRANSITION: 409,
  CAPACITY_EXCEEDED: 503
};

type Parsed<T> = { ok: true; data: T } | { ok: false; response: Response };

async function parseBody<T>(c: Context, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<Parsed<T>> {
  let json: unknown;
  try {
    json = await c.req.json();
  } catch {
    return { ok: false, response: c.json({ code: "BAD_REQUEST", message: "Invalid JSON body" }, 400) };
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    return { ok: false, response: c.json(toPipelineError(parsed.error).toJSON(), 400) };
  }
  return { ok: true, data: parsed.data };
}

function stagePatch(input: z.infer<typeof StagePatchSchema>): Partial<Omit<StageDescriptor, "name">> {
  const patch: Partial<Omit<StageDescriptor, "name">> = {};
  if (input.position !== undefined) patch.position = input.position;
  if (input.endpoint !== undefined) patch.endpoint = input.endpoint;
  if (input.timeoutMs !== undefined) patch.timeoutMs = input.timeoutMs;
  if (input.maxRetries !== undefined) patch.maxRetries = input.maxRetries;
  if (input.backoff !== undefined) patch.backoff = input.backoff;
  if (input.maxConcurrency !== undefined) patch.maxConcurrency = input.maxConcurrency;
  if (input.idempotent !== undefined) patch.idempotent = input.idempotent;
  if (input.accepts !== undefined) patch.accepts = input.accepts;
  return patch;
}

/**
 * Build the control-plane app. Kept separate from the listener so it can be
 * exercised through `app.request()`.
 */
export function createHttpApp(options: HttpAppOptions): { app: Hono; limiter: ConcurrencyLimiter } {
  const { engine } = options;
  const app = new Hono();

  // Ingress limiter - only wraps submissions (not reads or aborts)
  const limiter = new ConcurrencyLimiter({
    maxConcurrent: options.maxConcurrentSubmits ?? 16,
    queueTimeoutMs: options.queueTimeoutMs ?? 30_000,
    label: "ingress"
  });

  app.onError((err, c) => {
    if (err instanceof CapacityExceededError) {
      return c.json(
        {
          kind: "error",
          errorType: "capacity_exceeded",
          message: err.message,
          retryAfterMs: err.retryAfterMs
        },
        503
      );
    }
    const pipelineErr = toPipelineError(err);
    const status = STATUS_BY_CODE[pipelineErr.code] ?? 500;
    return c.json(pipelineErr.toJSON(), status);
  });

  app.get("/health", async (c) => {
    const health = await engine.health();
    return c.json({
      ok: health.status === "ok",
      ...health,
      ingress: { running: limiter.running, queued: limiter.queued, atCapacity: limiter.atCapacity }
    });
  });

  app.post("/control/submit", async (c) => {
    const body = await parseBody(c, SubmitSchema);
    if (!body.ok) return body.response;
    const requestId = await limiter.run(() => engine.submit(body.data.payloadRef));
    return c.json({ requestId }, 202);
  });

  app.post("/control/status", async (c) => {
    const body = await parseBody(c, RequestIdSchema);
    if (!body.ok) return body.response;
    const request = await engine.status(body.data.requestId);
    return c.json({ ...request, state: stateLabel(request) });
  });

  app.post("/control/abort", async (c) => {
    const body = await parseBody(c, AbortSchema);
    if (!body.ok) return body.response;
    const request = await engine.abort(body.data.requestId, body.data.reason);
    return c.json({ ...request, state: stateLabel(request) });
  });

  app.get("/stages", (c) => {
    return c.json({ order: engine.registry.pipelineOrder(), stages: engine.registry.list() });
  });

  // Register or update a stage. The change is checked against a copy of the
  // registry first so a bad descriptor never reaches the live one.
  app.put("/stages/:name", async (c) => {
    const name = c.req.param("name");
    const body = await parseBody(c, StagePatchSchema);
    if (!body.ok) return body.response;

    const live = engine.registry;
    const candidate = new StageRegistry(live.list());
    const existed = candidate.has(name);
    let descriptor: StageDescriptor;
    if (existed) {
      descriptor = candidate.update(name, stagePatch(body.data));
    } else {
      const positions = candidate.list().map((d) => d.position);
      const position = body.data.position ?? (positions.length > 0 ? Math.max(...positions) + 1 : 0);
      descriptor = candidate.register(normalizeDescriptor({ ...body.data, name, position }, position));
    }
    candidate.validate();

    const stored = live.upsert(descriptor);
    return c.json({ created: !existed, stage: stored }, existed ? 200 : 201);
  });

  // Completion callback for stage workers that answered "accepted".
  app.post("/callbacks/result", async (c) => {
    const body = await parseBody(c, ResultCallbackSchema);
    if (!body.ok) return body.response;
    const recorded = await engine.reportResult(body.data);
    return c.json({ recorded, duplicate: !recorded });
  });

  app.notFound((c) => c.json(new PipelineError("BAD_REQUEST", `No route for ${c.req.method} ${c.req.path}`).toJSON(), 404));

  return { app, limiter };
}

export function startHttpServer(options: HttpServerConfig): ServerType {
  const { app } = createHttpApp(options);
  const server = serve({ fetch: app.fetch, port: options.port, hostname: options.hostname ?? "127.0.0.1" });
  createLogger("http").info("listening", { url: `http://${options.hostname ?? "127.0.0.1"}:${options.port}` });
  return server;
}
