import fs from "node:fs";
import path from "node:path";
import type { LifecycleEvent } from "../orchestrator/events.js";

export function appendTrail(trailPath: string, line: string, at: string): void {
  fs.appendFileSync(trailPath, `- [${at}] ${line}\n`, "utf8");
}

export function appendError(errorsPath: string, title: string, at: string, details?: string): void {
  const header = `## ${at} ${title}\n`;
  const body = details ? `\n${details}\n` : "\n";
  fs.appendFileSync(errorsPath, `${header}${body}\n`, "utf8");
}

function safeSegment(value: string): string {
  return value.replace(/[^A-Za-z0-9._-]/g, "_");
}

/**
 * Human-readable record of each request under `<root>/<requestId>/`:
 * `trail.md` gets one line per lifecycle event, `errors.md` one section per
 * failed attempt, and every completed stage leaves a `<stage>.done` marker
 * holding its output ref.
 */
export class PaperTrail {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  dirFor(requestId: string): string {
    return path.join(this.root, safeSegment(requestId));
  }

  record(event: LifecycleEvent): void {
    const dir = this.dirFor(event.requestId);
    fs.mkdirSync(dir, { recursive: true });
    const trail = path.join(dir, "trail.md");
    const errors = path.join(dir, "errors.md");

    switch (event.type) {
      case "request_submitted":
        appendTrail(trail, `submitted ${event.payloadRef} (first stage ${event.firstStage})`, event.timestamp);
        break;
      case "stage_dispatched":
        appendTrail(trail, `dispatched ${event.stage} attempt ${event.attempt} by ${event.holderId}`, event.timestamp);
        break;
      case "stage_succeeded":
        appendTrail(trail, `${event.stage} succeeded on attempt ${event.attempt}: ${event.outputRef}`, event.timestamp);
        fs.writeFileSync(path.join(dir, `${safeSegment(event.stage)}.done`), `${event.outputRef}\n`, "utf8");
        break;
      case "stage_retry_scheduled":
        appendTrail(trail, `${event.stage} attempt ${event.attempt} failed, retry in ${event.delayMs}ms`, event.timestamp);
        appendError(errors, `${event.stage} attempt ${event.attempt}`, event.timestamp, event.error.message);
        break;
      case "request_completed":
        appendTrail(trail, `completed with ${event.result.outputs.length} outputs`, event.timestamp);
        break;
      case "request_failed":
        appendTrail(trail, `failed in ${event.failure.stage} after ${event.failure.attempts} attempts`, event.timestamp);
        appendError(
          errors,
          `${event.failure.stage} failed${event.failure.permanent ? " (permanent)" : ""}`,
          event.timestamp,
          event.failure.reason
        );
        break;
      case "request_aborted":
        appendTrail(trail, `aborted: ${event.reason}`, event.timestamp);
        break;
    }
  }
}
