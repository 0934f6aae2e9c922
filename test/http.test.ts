import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { Hono } from "hono";
import { z } from "zod";
import { PipelineEngine } from "../src/pipeline/engine.js";
import { LocalStageTransport } from "../src/pipeline/invoker/transport.js";
import { StageRegistry } from "../src/pipeline/registry/stageRegistry.js";
import { createHttpApp } from "../src/server/http.js";
import { stage, testConfig } from "./helpers.js";

// Response schemas at module level so the assertions are typed
const ErrorBody = z.object({ code: z.string(), message: z.string() });
const SubmitBody = z.object({ requestId: z.string() });
const StatusBody = z.object({
  id: z.string(),
  payloadRef: z.string(),
  state: z.string(),
  abortReason: z.string().optional()
});
const HealthBody = z.object({
  ok: z.boolean(),
  status: z.string(),
  stages: z.array(z.string()),
  ingress: z.object({ running: z.number(), queued: z.number(), atCapacity: z.boolean() })
});
const StagesBody = z.object({ order: z.array(z.string()) });

function post(app: Hono, route: string, body: unknown): Promise<Response> {
  return Promise.resolve(
    app.request(route, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body)
    })
  );
}

describe("HTTP control API", () => {
  let engine: PipelineEngine;
  let app: Hono;

  beforeEach(async () => {
    engine = new PipelineEngine({
      config: testConfig(),
      registry: new StageRegistry([stage("intake", 0, { accepts: ["repo", "blob"] }), stage("classifier", 1)]),
      transport: new LocalStageTransport({ classifier: async () => ({ status: "accepted" }) })
    });
    await engine.start();
    app = createHttpApp({ engine, maxConcurrentSubmits: 2 }).app;
  });

  afterEach(async () => {
    await engine.stop();
  });

  it("reports health", async () => {
    const res = await app.request("/health");
    expect(res.status).toBe(200);
    const body = HealthBody.parse(await res.json());
    expect(body.ok).toBe(true);
    expect(body.status).toBe("ok");
    expect(body.stages).toEqual(["intake", "classifier"]);
    expect(body.ingress).toEqual({ running: 0, queued: 0, atCapacity: false });
  });

  it("submits, reports status and aborts", async () => {
    const submitted = await post(app, "/control/submit", { payloadRef: "repo:acme/widgets" });
    expect(submitted.status).toBe(202);
    const { requestId } = SubmitBody.parse(await submitted.json());
    expect(requestId).toMatch(/^[0-9a-f-]{36}$/);

    const status = await post(app, "/control/status", { requestId });
    expect(status.status).toBe(200);
    const body = StatusBody.parse(await status.json());
    expect(body.id).toBe(requestId);
    expect(body.payloadRef).toBe("repo:acme/widgets");

    const aborted = await post(app, "/control/abort", { requestId, reason: "duplicate submission" });
    const abortedBody = StatusBody.parse(await aborted.json());
    expect(abortedBody.state).toBe("ABORTED");
    expect(abortedBody.abortReason).toBe("duplicate submission");
  });

  it("maps errors to status codes", async () => {
    const invalidJson = await app.request("/control/submit", { method: "POST", body: "{nope" });
    expect(invalidJson.status).toBe(400);
    expect(await invalidJson.json()).toEqual({ code: "BAD_REQUEST", message: "Invalid JSON body" });

    const missingField = await post(app, "/control/submit", {});
    expect(missingField.status).toBe(400);
    expect(ErrorBody.parse(await missingField.json()).code).toBe("BAD_REQUEST");

    const badScheme = await post(app, "/control/submit", { payloadRef: "ftp:elsewhere" });
    expect(badScheme.status).toBe(400);

    const unknown = await post(app, "/control/status", { requestId: "missing" });
    expect(unknown.status).toBe(404);
    expect(ErrorBody.parse(await unknown.json()).code).toBe("REQUEST_NOT_FOUND");

    const noRoute = await app.request("/control/nothing");
    expect(noRoute.status).toBe(404);
  });

  it("lists and registers stages", async () => {
    const listed = await app.request("/stages");
    const list = StagesBody.parse(await listed.json());
    expect(list.order).toEqual(["intake", "classifier"]);

    const created = await app.request("/stages/safety", {
      method: "PUT",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ timeoutMs: 5_000, maxRetries: 1 })
    });
    expect(created.status).toBe(201);
    expect(await created.json()).toMatchObject({ created: true, stage: { name: "safety", position: 2, timeoutMs: 5_000 } });
    expect(engine.registry.pipelineOrder()).toEqual(["intake", "classifier", "safety"]);

    const updated = await app.request("/stages/safety", {
      method: "PUT",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ maxConcurrency: 9 })
    });
    expect(updated.status).toBe(200);
    expect(engine.registry.require("safety")).toMatchObject({ maxConcurrency: 9, timeoutMs: 5_000 });

    const clash = await app.request("/stages/embeddings", {
      method: "PUT",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ position: 1 })
    });
    expect(clash.status).toBe(400);
    expect(ErrorBody.parse(await clash.json()).code).toBe("CONFIGURATION");
    expect(engine.registry.has("embeddings")).toBe(false);

    const moved = await app.request("/stages/intake", {
      method: "PUT",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ position: 4 })
    });
    expect(moved.status).toBe(400);
    expect(ErrorBody.parse(await moved.json())).toEqual({
      code: "CONFIGURATION",
      message: 'Stage "intake" cannot move from position 0 to 4'
    });
    expect(engine.registry.pipelineOrder()).toEqual(["intake", "classifier", "safety"]);
  });

  it("records worker callbacks once", async () => {
    const submitted = await post(app, "/control/submit", { payloadRef: "blob:sample" });
    const { requestId } = SubmitBody.parse(await submitted.json());
    await expect
      .poll(async () => (await engine.status(requestId)).currentStage, { timeout: 2_000, interval: 5 })
      .toBe("classifier");

    const callback = { requestId, stage: "classifier", attempt: 1, status: "success", outputRef: "blob:classes" };
    const first = await post(app, "/callbacks/result", callback);
    expect(await first.json()).toEqual({ recorded: true, duplicate: false });
    const second = await post(app, "/callbacks/result", callback);
    expect(await second.json()).toEqual({ recorded: false, duplicate: true });

    const bad = await post(app, "/callbacks/result", { ...callback, status: "maybe" });
    expect(bad.status).toBe(400);

    const done = await engine.waitForTerminal(requestId, { timeoutMs: 2_000, pollMs: 5 });
    expect(done.outputs.classifier).toBe("blob:classes");
  });
});
