import type { PipelineConfig } from "../src/pipeline/config.js";
import { normalizeDescriptor, type StageDescriptorInput } from "../src/pipeline/registry/schema.js";
import type { StageDescriptor } from "../src/pipeline/types.js";

/**
 * Descriptor with stage defaults, overridable per test.
 */
export function stage(name: string, position: number, overrides: Omit<StageDescriptorInput, "name"> = {}): StageDescriptor {
  return normalizeDescriptor({ name, position, ...overrides }, position);
}

/**
 * Manual clock for ledger and orchestrator tests.
 */
export class FakeClock {
  constructor(public value = Date.parse("2026-03-01T12:00:00.000Z")) {}

  now = (): number => this.value;

  advance(ms: number): void {
    this.value += ms;
  }
}

export function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Engine configuration with fast timers and no files.
 */
export function testConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  return {
    dbPath: undefined,
    pipelineFile: undefined,
    trailDir: undefined,
    holderId: "orch-test",
    leaseGraceMs: 1_000,
    tickIntervalMs: 5,
    sweepIntervalMs: 20,
    maxInFlight: 16,
    queueTimeoutMs: 1_000,
    logLevel: "silent",
    ...overrides
  };
}
