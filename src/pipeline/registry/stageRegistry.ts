/**
 * Stage Registry - maps stage names to their capability descriptors.
 *
 * Read-mostly. Registrations and updates are visible to the next resolve()
 * without restarting the orchestrator; adding a stage at runtime is a
 * registry update, never code generation.
 */

import { ConfigurationError } from "../errors.js";
import type { StageDescriptor } from "../types.js";
import { StageDescriptorSchema } from "./schema.js";

export type RegistryChange =
  | { kind: "registered"; descriptor: StageDescriptor }
  | { kind: "updated"; descriptor: StageDescriptor; previous: StageDescriptor }
  | { kind: "unregistered"; descriptor: StageDescriptor };

export type RegistryListener = (change: RegistryChange) => void;

function cloneDescriptor(descriptor: StageDescriptor): StageDescriptor {
  const copy: StageDescriptor = { ...descriptor, backoff: { ...descriptor.backoff } };
  if (descriptor.accepts) copy.accepts = [...descriptor.accepts];
  return copy;
}

function checkDescriptor(descriptor: StageDescriptor): StageDescriptor {
  const parsed = StageDescriptorSchema.safeParse(descriptor);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid descriptor for stage "${descriptor.name}"`, {
      issues: parsed.error.issues
    });
  }
  return cloneDescriptor(descriptor);
}

export class StageRegistry {
  private readonly stages = new Map<string, StageDescriptor>();
  private readonly listeners = new Set<RegistryListener>();

  constructor(descriptors: StageDescriptor[] = []) {
    for (const descriptor of descriptors) {
      this.register(descriptor);
    }
  }

  /**
   * Look up a stage. Returns undefined for unknown stages.
   */
  resolve(name: string): StageDescriptor | undefined {
    const found = this.stages.get(name);
    return found ? cloneDescriptor(found) : undefined;
  }

  /**
   * Look up a stage that the pipeline order references.
   * @throws ConfigurationError for an unknown stage
   */
  require(name: string): StageDescriptor {
    const found = this.resolve(name);
    if (!found) {
      throw new ConfigurationError(`Stage "${name}" is not registered`, { stage: name });
    }
    return found;
  }

  has(name: string): boolean {
    return this.stages.has(name);
  }

  register(descriptor: StageDescriptor): StageDescriptor {
    if (this.stages.has(descriptor.name)) {
      throw new ConfigurationError(`Stage "${descriptor.name}" is already registered`, { stage: descriptor.name });
    }
    const stored = checkDescriptor(descriptor);
    this.stages.set(stored.name, stored);
    this.notify({ kind: "registered", descriptor: cloneDescriptor(stored) });
    return cloneDescriptor(stored);
  }

  /**
   * Replace fields of an existing descriptor. The name and position cannot
   * change: requests already past a stage rely on it staying behind them.
   */
  update(name: string, patch: Partial<Omit<StageDescriptor, "name">>): StageDescriptor {
    const previous = this.stages.get(name);
    if (!previous) {
      throw new ConfigurationError(`Stage "${name}" is not registered`, { stage: name });
    }
    if (patch.position !== undefined && patch.position !== previous.position) {
      throw new ConfigurationError(`Stage "${name}" cannot move from position ${previous.position} to ${patch.position}`, {
        stage: name,
        position: previous.position
      });
    }
    const stored = checkDescriptor({ ...previous, ...patch, name });
    this.stages.set(name, stored);
    this.notify({ kind: "updated", descriptor: cloneDescriptor(stored), previous: cloneDescriptor(previous) });
    return cloneDescriptor(stored);
  }

  /**
   * Register a new stage or replace an existing one wholesale.
   */
  upsert(descriptor: StageDescriptor): StageDescriptor {
    if (!this.stages.has(descriptor.name)) return this.register(descriptor);
    const { name, ...rest } = descriptor;
    return this.update(name, rest);
  }

  unregister(name: string): boolean {
    const previous = this.stages.get(name);
    if (!previous) return false;
    this.stages.delete(name);
    this.notify({ kind: "unregistered", descriptor: cloneDescriptor(previous) });
    return true;
  }

  list(): StageDescriptor[] {
    return this.pipelineOrder().map((name) => this.require(name));
  }

  /**
   * Stage names sorted by position.
   */
  pipelineOrder(): string[] {
    return Array.from(this.stages.values())
      .sort((a, b) => a.position - b.position || a.name.localeCompare(b.name))
      .map((d) => d.name);
  }

  first(): string | undefined {
    return this.pipelineOrder()[0];
  }

  /**
   * The stage after `stage`, or undefined when `stage` is last.
   * @throws ConfigurationError when `stage` is not registered
   */
  next(stage: string): string | undefined {
    const order = this.pipelineOrder();
    const idx = order.indexOf(stage);
    if (idx === -1) {
      throw new ConfigurationError(`Stage "${stage}" is not registered`, { stage });
    }
    return order[idx + 1];
  }

  positionOf(stage: string): number {
    return this.pipelineOrder().indexOf(stage);
  }

  /**
   * Startup check for the declared pipeline. Every problem found is reported
   * in one ConfigurationError.
   */
  validate(declaredOrder?: string[]): void {
    const problems: string[] = [];
    if (this.stages.size === 0) {
      problems.push("pipeline has no stages");
    }

    const byPosition = new Map<number, string>();
    for (const descriptor of this.stages.values()) {
      const clash = byPosition.get(descriptor.position);
      if (clash !== undefined) {
        problems.push(`stages "${clash}" and "${descriptor.name}" share position ${descriptor.position}`);
      } else {
        byPosition.set(descriptor.position, descriptor.name);
      }
      if (!descriptor.idempotent) {
        problems.push(`stage "${descriptor.name}" is not idempotent`);
      }
    }

    if (declaredOrder) {
      const seen = new Set<string>();
      for (const name of declaredOrder) {
        if (seen.has(name)) problems.push(`stage "${name}" appears twice in the pipeline order`);
        seen.add(name);
        if (!this.stages.has(name)) problems.push(`pipeline order references unregistered stage "${name}"`);
      }
      const actual = this.pipelineOrder();
      if (problems.length === 0 && actual.join(",") !== declaredOrder.join(",")) {
        problems.push(`declared order [${declaredOrder.join(", ")}] does not match stage positions [${actual.join(", ")}]`);
      }
    }

    if (problems.length > 0) {
      throw new ConfigurationError(`Invalid pipeline configuration: ${problems.join("; ")}`, { problems });
    }
  }

  onChange(listener: RegistryListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(change: RegistryChange): void {
    for (const listener of this.listeners) {
      listener(change);
    }
  }
}
