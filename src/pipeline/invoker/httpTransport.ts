import { z } from "zod";
import { ConfigurationError, PermanentStageError, TransientStageError } from "../errors.js";
import type { StageCallRequest, StageCallResponse, StageTransport } from "./transport.js";

/**
 * Wire shape of a stage worker reply:
 * `{ status: success|failure|accepted, output_ref?, error?, retryable? }`.
 */
export const StageWorkerResponseSchema = z.object({
  status: z.enum(["success", "failure", "accepted"]),
  output_ref: z.string().min(1).optional(),
  error: z.string().optional(),
  retryable: z.boolean().optional()
});

export type HttpStageTransportOptions = {
  /** Extra headers sent with every call (auth, tracing). */
  headers?: Record<string, string>;
  /** URL the worker should POST async results to, forwarded as `callback_url`. */
  callbackUrl?: string;
};

/** Status codes that say "try again later" rather than "bad input". */
const RETRYABLE_CLIENT_STATUSES = new Set([408, 409, 425, 429]);

/**
 * Calls stage workers over HTTP: POST `{ request_id, payload_ref, stage_config, ... }`
 * to the descriptor's endpoint.
 */
export class HttpStageTransport implements StageTransport {
  private readonly headers: Record<string, string>;
  private readonly callbackUrl: string | undefined;

  constructor(options: HttpStageTransportOptions = {}) {
    this.headers = options.headers ?? {};
    this.callbackUrl = options.callbackUrl;
  }

  async call(request: StageCallRequest, signal: AbortSignal): Promise<StageCallResponse> {
    const endpoint = request.stageConfig.endpoint;
    if (!endpoint) {
      throw new ConfigurationError(`Stage "${request.stage}" has no endpoint`, { stage: request.stage });
    }

    let response: Response;
    try {
      response = await fetch(endpoint, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "Idempotency-Key": `${request.requestId}:${request.stage}`,
          ...this.headers
        },
        body: JSON.stringify({
          request_id: request.requestId,
          stage: request.stage,
          attempt: request.attempt,
          payload_ref: request.payloadRef,
          inputs: request.inputs,
          stage_config: request.stageConfig,
          ...(this.callbackUrl !== undefined && { callback_url: this.callbackUrl })
        }),
        signal
      });
    } catch (err) {
      // Aborts belong to the invoker's timeout handling.
      if (signal.aborted) throw err;
      throw new TransientStageError(`Stage "${request.stage}" unreachable: ${err instanceof Error ? err.message : String(err)}`, {
        endpoint
      });
    }

    if (!response.ok) {
      const text = await response.text().catch(() => "");
      const message = `Stage "${request.stage}" answered HTTP ${response.status}${text ? `: ${text.slice(0, 200)}` : ""}`;
      if (response.status >= 500 || RETRYABLE_CLIENT_STATUSES.has(response.status)) {
        throw new TransientStageError(message, { endpoint, status: response.status });
      }
      throw new PermanentStageError(message, { endpoint, status: response.status });
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch {
      throw new TransientStageError(`Stage "${request.stage}" returned a non-JSON body`, { endpoint });
    }

    const parsed = StageWorkerResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new TransientStageError(`Stage "${request.stage}" returned a malformed reply`, {
        endpoint,
        issues: parsed.error.issues
      });
    }
    return toCallResponse(request.stage, parsed.data);
  }
}

export function toCallResponse(
  stage: string,
  reply: z.infer<typeof StageWorkerResponseSchema>
): StageCallResponse {
  switch (reply.status) {
    case "accepted":
      return { status: "accepted" };
    case "success":
      if (reply.output_ref === undefined) {
        throw new TransientStageError(`Stage "${stage}" reported success without output_ref`);
      }
      return { status: "success", outputRef: reply.output_ref };
    case "failure": {
      const failure: Extract<StageCallResponse, { status: "failure" }> = { status: "failure", error: reply.error ?? "stage reported failure" };
      if (reply.retryable !== undefined) failure.retryable = reply.retryable;
      return failure;
    }
  }
}

/**
 * Sends stages that declare an endpoint to `remote` and everything else to
 * `local`.
 */
export class RoutingStageTransport implements StageTransport {
  private readonly remote: StageTransport;
  private readonly local: StageTransport;

  constructor(remote: StageTransport, local: StageTransport) {
    this.remote = remote;
    this.local = local;
  }

  call(request: StageCallRequest, signal: AbortSignal): Promise<StageCallResponse> {
    return request.stageConfig.endpoint ? this.remote.call(request, signal) : this.local.call(request, signal);
  }
}
