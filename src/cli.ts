#!/usr/bin/env node
import { Command, InvalidArgumentError } from "commander";
import process from "node:process";
import chalk from "chalk";
import { loadConfig, type PipelineConfig } from "./pipeline/config.js";
import { PipelineEngine } from "./pipeline/engine.js";
import { toPipelineError } from "./pipeline/errors.js";
import { LocalStageTransport } from "./pipeline/invoker/transport.js";
import { RequestLedger } from "./pipeline/ledger/requestLedger.js";
import { SqlitePipelineStore } from "./pipeline/ledger/sqliteStore.js";
import { setLogLevel } from "./pipeline/logger.js";
import { addStageToFile, loadPipeline } from "./pipeline/registry/loader.js";
import type { StageDescriptorInput } from "./pipeline/registry/schema.js";
import { stateLabel, type Request, type StageDescriptor } from "./pipeline/types.js";
import { startHttpServer } from "./server/http.js";

/**
 * Exit codes for CLI commands.
 */
const EXIT_CODES = {
  OK: 0, // Request completed
  FAILED: 10, // Request reached FAILED
  ERROR: 30, // Fatal error before a terminal state
  ABORTED: 40 // Aborted (SIGINT/SIGTERM or control call)
} as const;

type CommonOptions = {
  pipeline?: string;
  db?: string;
  trail?: string;
};

function intOption(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}

function configFrom(opts: CommonOptions): PipelineConfig {
  const config = loadConfig(process.env);
  setLogLevel(config.logLevel);
  return {
    ...config,
    pipelineFile: opts.pipeline ?? config.pipelineFile,
    dbPath: opts.db ?? config.dbPath,
    trailDir: opts.trail ?? config.trailDir
  };
}

function fail(err: unknown): never {
  const pipelineErr = toPipelineError(err);
  process.stderr.write(chalk.red(`Error: [${pipelineErr.code}] ${pipelineErr.message}\n`));
  process.exit(EXIT_CODES.ERROR);
}

const program = new Command();

program.name("digestflow").description("Staged repository digest pipeline orchestrator").version("0.1.0");

program
  .command("serve")
  .description("Run the orchestrator, an invoker worker and the HTTP control API")
  .option("--port <port>", "Port", intOption, 8765)
  .option("--host <host>", "Interface to bind", "127.0.0.1")
  .option("--pipeline <file>", "Pipeline definition (JSON)")
  .option("--db <file>", "Ledger database file (defaults to in-memory)")
  .option("--trail <dir>", "Write a per-request paper trail under this directory")
  .action(async (opts: CommonOptions & { port: number; host: string }) => {
    try {
      const config = configFrom(opts);
      const engine = new PipelineEngine({
        config,
        callbackUrl: `http://${opts.host}:${opts.port}/callbacks/result`
      });
      await engine.start();
      const server = startHttpServer({ engine, port: opts.port, hostname: opts.host });

      const shutdown = (signal: string) => {
        process.stderr.write(chalk.yellow(`\nReceived ${signal}, shutting down...\n`));
        server.close();
        void engine.stop().then(
          () => process.exit(EXIT_CODES.OK),
          (err: unknown) => fail(err)
        );
      };
      process.once("SIGINT", () => shutdown("SIGINT"));
      process.once("SIGTERM", () => shutdown("SIGTERM"));
    } catch (err) {
      fail(err);
    }
  });

program
  .command("run")
  .description("Run one payload through the pipeline with local no-op stage workers")
  .argument("<payloadRef>", "Payload reference, e.g. repo:example/project")
  .option("--pipeline <file>", "Pipeline definition (JSON)")
  .option("--db <file>", "Ledger database file (defaults to in-memory)")
  .option("--trail <dir>", "Write a per-request paper trail under this directory")
  .option("--timeout <ms>", "Give up after this many ms", intOption, 300_000)
  .option("--json", "Output the final request as JSON", false)
  .action(async (payloadRef: string, opts: CommonOptions & { timeout: number; json: boolean }) => {
    let engine: PipelineEngine | undefined;
    try {
      const config = configFrom(opts);
      engine = new PipelineEngine({ config, transport: new LocalStageTransport() });
      await engine.start();

      const requestId = await engine.submit(payloadRef);
      process.stderr.write(chalk.blue(`Submitted ${payloadRef}\n`));
      process.stderr.write(chalk.dim(`  Request: ${requestId}\n`));
      process.stderr.write(chalk.dim(`  Stages: ${engine.registry.pipelineOrder().join(" -> ")}\n\n`));

      const running = engine;
      let signalled = false;
      const handleSignal = (signal: string) => {
        if (signalled) {
          process.stderr.write(chalk.red(`\nForced exit on second ${signal}\n`));
          process.exit(EXIT_CODES.ABORTED);
        }
        signalled = true;
        process.stderr.write(chalk.yellow(`\nReceived ${signal}, aborting ${requestId}...\n`));
        void running.abort(requestId, `cancelled by ${signal}`).catch((err: unknown) => fail(err));
      };
      process.on("SIGINT", () => handleSignal("SIGINT"));
      process.on("SIGTERM", () => handleSignal("SIGTERM"));

      const request = await engine.waitForTerminal(requestId, { timeoutMs: opts.timeout });
      await engine.stop();

      if (opts.json) {
        process.stdout.write(JSON.stringify(request, null, 2) + "\n");
      } else {
        outputRequestHuman(request);
      }
      process.exit(exitCodeFor(request));
    } catch (err) {
      await engine?.stop().catch((stopErr: unknown) => {
        process.stderr.write(chalk.dim(`  (shutdown: ${stopErr instanceof Error ? stopErr.message : String(stopErr)})\n`));
      });
      fail(err);
    }
  });

program
  .command("stages")
  .description("Print the pipeline order and stage descriptors")
  .option("--pipeline <file>", "Pipeline definition (JSON)")
  .option("--json", "Output descriptors as JSON", false)
  .action((opts: { pipeline?: string; json: boolean }) => {
    try {
      const loaded = loadPipeline(opts.pipeline ?? loadConfig(process.env).pipelineFile);
      if (opts.json) {
        process.stdout.write(JSON.stringify(loaded, null, 2) + "\n");
        return;
      }
      process.stdout.write(chalk.bold(`Pipeline (${loaded.source})\n`));
      const byName = new Map(loaded.descriptors.map((d) => [d.name, d]));
      loaded.declaredOrder.forEach((name, index) => {
        const descriptor = byName.get(name);
        if (descriptor) process.stdout.write(formatStage(index + 1, descriptor));
      });
    } catch (err) {
      fail(err);
    }
  });

program
  .command("stages:add")
  .description("Add a stage to a pipeline file (created from the built-in stages if missing)")
  .argument("<name>", "Stage name")
  .requiredOption("--pipeline <file>", "Pipeline definition (JSON)")
  .option("--endpoint <url>", "Stage worker URL")
  .option("--position <n>", "Position in the pipeline (defaults to last)", intOption)
  .option("--timeout <ms>", "Per-attempt timeout", intOption)
  .option("--retries <n>", "Retries after the first attempt", intOption)
  .option("--concurrency <n>", "Concurrent calls per invoker", intOption)
  .action(
    (
      name: string,
      opts: {
        pipeline: string;
        endpoint?: string;
        position?: number;
        timeout?: number;
        retries?: number;
        concurrency?: number;
      }
    ) => {
      try {
        const input: StageDescriptorInput = { name };
        if (opts.endpoint !== undefined) input.endpoint = opts.endpoint;
        if (opts.position !== undefined) input.position = opts.position;
        if (opts.timeout !== undefined) input.timeoutMs = opts.timeout;
        if (opts.retries !== undefined) input.maxRetries = opts.retries;
        if (opts.concurrency !== undefined) input.maxConcurrency = opts.concurrency;
        const descriptor = addStageToFile(opts.pipeline, input);
        process.stdout.write(chalk.green(`Added stage ${descriptor.name} at position ${descriptor.position}\n`));
      } catch (err) {
        fail(err);
      }
    }
  );

program
  .command("status")
  .description("Print a request and its stage history from a ledger file")
  .argument("<requestId>", "Request id")
  .requiredOption("--db <file>", "Ledger database file")
  .option("--json", "Output the request as JSON", false)
  .action(async (requestId: string, opts: { db: string; json: boolean }) => {
    const store = new SqlitePipelineStore(opts.db);
    try {
      await store.init();
      const request = await new RequestLedger(store).get(requestId);
      if (opts.json) {
        process.stdout.write(JSON.stringify(request, null, 2) + "\n");
      } else {
        outputRequestHuman(request);
      }
      store.close();
    } catch (err) {
      store.close();
      fail(err);
    }
  });

function exitCodeFor(request: Request): number {
  switch (request.currentStage) {
    case "COMPLETED":
      return EXIT_CODES.OK;
    case "FAILED":
      return EXIT_CODES.FAILED;
    case "ABORTED":
      return EXIT_CODES.ABORTED;
    default:
      return EXIT_CODES.ERROR;
  }
}

function formatStage(index: number, d: StageDescriptor): string {
  const target = d.endpoint ?? "local";
  return (
    `  ${String(index).padStart(2)}. ${chalk.cyan(d.name)} ${chalk.dim(target)}` +
    chalk.dim(` timeout=${d.timeoutMs}ms retries=${d.maxRetries} concurrency=${d.maxConcurrency}\n`)
  );
}

function outputRequestHuman(request: Request): void {
  switch (request.currentStage) {
    case "COMPLETED":
      process.stderr.write(chalk.green(`✓ ${request.id} completed\n`));
      for (const output of request.result?.outputs ?? []) {
        process.stderr.write(chalk.dim(`  ${output.stage}: ${output.outputRef}\n`));
      }
      break;
    case "FAILED":
      process.stderr.write(chalk.red(`✗ ${request.id} failed in ${request.failure?.stage ?? "unknown stage"}\n`));
      process.stderr.write(chalk.dim(`  Attempts: ${request.failure?.attempts ?? request.attemptCount}\n`));
      process.stderr.write(chalk.dim(`  Reason: ${request.failure?.reason ?? "unknown"}\n`));
      break;
    case "ABORTED":
      process.stderr.write(chalk.magenta(`■ ${request.id} aborted: ${request.abortReason ?? "no reason given"}\n`));
      break;
    default:
      process.stderr.write(chalk.blue(`… ${request.id} is ${stateLabel(request)}\n`));
  }
  for (const entry of request.stageHistory) {
    const line = `  [${entry.timestamp}] ${entry.stage} #${entry.attempt} ${entry.outcome}`;
    const detail = entry.outputRef ?? entry.error?.message;
    process.stderr.write(chalk.dim(`${line}${detail ? `: ${detail}` : ""}\n`));
  }
}

await program.parseAsync(process.argv);
