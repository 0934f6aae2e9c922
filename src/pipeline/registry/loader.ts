import fs from "node:fs";
import path from "node:path";
import { ConfigurationError, PipelineError } from "../errors.js";
import type { StageDescriptor } from "../types.js";
import { defaultStageDescriptors, defaultStageInputs } from "./defaults.js";
import { PipelineFileSchema, normalizeDescriptor, type PipelineFile, type StageDescriptorInput } from "./schema.js";
import { StageRegistry } from "./stageRegistry.js";

export type LoadedPipeline = {
  descriptors: StageDescriptor[];
  declaredOrder: string[];
  source: string;
};

function readPipelineFile(filePath: string): PipelineFile {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (err) {
    throw new PipelineError("IO_ERROR", `Cannot read pipeline file ${filePath}`, {
      err: err instanceof Error ? err.message : String(err)
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(`Pipeline file ${filePath} is not valid JSON`, {
      err: err instanceof Error ? err.message : String(err)
    });
  }

  const parsed = PipelineFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigurationError(`Pipeline file ${filePath} is malformed`, { issues: parsed.error.issues });
  }
  return parsed.data;
}

/**
 * Load stage descriptors from a pipeline file, or the built-in digest
 * pipeline when no file is given.
 */
export function loadPipeline(filePath?: string): LoadedPipeline {
  if (filePath === undefined) {
    const descriptors = defaultStageDescriptors();
    return { descriptors, declaredOrder: descriptors.map((d) => d.name), source: "builtin" };
  }
  const file = readPipelineFile(filePath);
  const descriptors = file.stages.map((input, index) => normalizeDescriptor(input, index));
  const declaredOrder = [...descriptors]
    .sort((a, b) => a.position - b.position || a.name.localeCompare(b.name))
    .map((d) => d.name);
  return { descriptors, declaredOrder, source: path.resolve(filePath) };
}

/**
 * Build a registry and run the startup check against the declared order.
 * @throws ConfigurationError when the pipeline is unusable
 */
export function createRegistry(filePath?: string): StageRegistry {
  const loaded = loadPipeline(filePath);
  const registry = new StageRegistry(loaded.descriptors);
  registry.validate(loaded.declaredOrder);
  return registry;
}

/**
 * Append a stage to a pipeline file, creating the file from the built-in
 * pipeline when it does not exist. New stages go last unless a position is
 * given.
 */
export function addStageToFile(filePath: string, stage: StageDescriptorInput): StageDescriptor {
  const file: PipelineFile = fs.existsSync(filePath)
    ? readPipelineFile(filePath)
    : { stages: defaultStageInputs() };

  if (file.stages.some((s) => s.name === stage.name)) {
    throw new ConfigurationError(`Stage "${stage.name}" already exists in ${filePath}`, { stage: stage.name });
  }

  const positions = file.stages.map((s, index) => s.position ?? index);
  const position = stage.position ?? (positions.length > 0 ? Math.max(...positions) + 1 : 0);
  const entry: StageDescriptorInput = { ...stage, position };
  const next: PipelineFile = { stages: [...file.stages, entry] };

  // Validate the whole resulting pipeline before touching the file.
  const registry = new StageRegistry(next.stages.map((input, index) => normalizeDescriptor(input, index)));
  registry.validate();

  fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
  fs.writeFileSync(filePath, `${JSON.stringify(next, null, 2)}\n`, "utf8");
  return registry.require(stage.name);
}
