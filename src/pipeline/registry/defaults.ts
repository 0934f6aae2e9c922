import type { StageDescriptor } from "../types.js";
import { normalizeDescriptor, type StageDescriptorInput } from "./schema.js";

/**
 * The digest pipeline, in order.
 */
export const DEFAULT_STAGE_NAMES = [
  "intake",
  "classifier",
  "graph_extract",
  "embeddings",
  "env_synthesis",
  "safety",
  "runner",
  "integrator",
  "registrar"
] as const;

export const DEFAULT_PAYLOAD_SCHEMES = ["blob", "repo", "artifact"];

export function defaultStageInputs(): StageDescriptorInput[] {
  return DEFAULT_STAGE_NAMES.map((name) =>
    name === "intake" ? { name, accepts: [...DEFAULT_PAYLOAD_SCHEMES] } : { name }
  );
}

export function defaultStageDescriptors(): StageDescriptor[] {
  return defaultStageInputs().map((input, index) => normalizeDescriptor(input, index));
}
