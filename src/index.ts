// Engine and control API
export { PipelineEngine } from "./pipeline/engine.js";
export type { EngineOptions, EngineHealth, PipelineStore, ResultReport, WaitOptions } from "./pipeline/engine.js";
export { loadConfig, EnvSchema, defaultHolderId } from "./pipeline/config.js";
export type { PipelineConfig } from "./pipeline/config.js";

// Data model
export * from "./pipeline/types.js";
export * from "./pipeline/errors.js";
export { createLogger, setLogLevel, setLogSink, formatLogLine } from "./pipeline/logger.js";
export type { Logger, LogLevel, LogSink } from "./pipeline/logger.js";

// Stage registry
export { StageRegistry } from "./pipeline/registry/stageRegistry.js";
export type { RegistryChange, RegistryListener } from "./pipeline/registry/stageRegistry.js";
export { createRegistry, loadPipeline, addStageToFile } from "./pipeline/registry/loader.js";
export { StageDescriptorSchema, StageDescriptorInputSchema, PipelineFileSchema, STAGE_DEFAULTS } from "./pipeline/registry/schema.js";
export type { StageDescriptorInput, PipelineFile } from "./pipeline/registry/schema.js";
export { DEFAULT_STAGE_NAMES, defaultStageDescriptors } from "./pipeline/registry/defaults.js";

// Ledger
export { RequestLedger, expectApplied } from "./pipeline/ledger/requestLedger.js";
export type { TransitionChange, TransitionTarget, LedgerFilter, LedgerStats } from "./pipeline/ledger/requestLedger.js";
export { MemoryPipelineStore } from "./pipeline/ledger/memoryStore.js";
export { SqlitePipelineStore } from "./pipeline/ledger/sqliteStore.js";
export type { LedgerStore, LedgerRecord, AttemptJournal, AttemptKey, JournalEntry } from "./pipeline/ledger/types.js";

// Bus
export { InMemoryEventBus } from "./pipeline/bus/memoryBus.js";
export * from "./pipeline/bus/topics.js";
export type { EventBus, Subscription, SubscribeOptions, DeliveryMeta, DeadLetter } from "./pipeline/bus/types.js";

// Invoker
export { StageInvoker } from "./pipeline/invoker/stageInvoker.js";
export type { InvocationOutcome, InvokeOptions } from "./pipeline/invoker/stageInvoker.js";
export { LocalStageTransport, defaultOutputRef } from "./pipeline/invoker/transport.js";
export type { StageTransport, StageCallRequest, StageCallResponse, LocalStageHandler } from "./pipeline/invoker/transport.js";
export { HttpStageTransport, RoutingStageTransport } from "./pipeline/invoker/httpTransport.js";

// Accumulator, orchestrator, audit
export { ResultAccumulator, buildComposite } from "./pipeline/accumulator/resultAccumulator.js";
export type { MergeOutcome } from "./pipeline/accumulator/resultAccumulator.js";
export * from "./pipeline/orchestrator/index.js";
export { PaperTrail } from "./pipeline/audit/paperTrail.js";
export { ConcurrencyLimiter, KeyedConcurrencyLimiter, CapacityExceededError } from "./pipeline/utils/concurrencyLimiter.js";

// HTTP
export { createHttpApp, startHttpServer } from "./server/http.js";
