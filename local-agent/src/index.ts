/**
 * Idlewise Local Agent
 *
 * Loads configuration and items from the cache directory, starts the
 * engine, and hands the terminal to the CLI.
 *
 * Cache directory layout (default ~/.idlewise, IDLEWISE_CACHE_DIR overrides):
 * - .env              IDLEWISE_* settings
 * - items.json        item definitions
 * - memory.tsv        persisted variables
 * - successes-<fn>    success log of dataset-less items
 * - calls-<fn>        invocation log
 * - agent.pid         instance marker
 * - logs/             rotated JSONL logs
 */

import * as path from "path";
import * as readline from "readline";
import { spawn } from "child_process";
import { defaultCacheDir, loadConfig, ITEMS_FILENAME } from "./core/config.js";
import type { AgentConfig } from "./core/config.js";
import { loadAgentEnv } from "./core/env.js";
import { startCli, TerminalPrompter } from "./core/cli.js";
import { Engine } from "./engine.js";
import { buildItemDefs, loadItemSpecs } from "./items/loader.js";
import type { ItemIO } from "./items/loader.js";
import { initAgentLogging, logDirFor } from "./logging.js";

// ============================================
// CONFIGURATION
// ============================================

const envResult = loadAgentEnv(defaultCacheDir());

let config: AgentConfig;
try {
  config = loadConfig();
} catch (err) {
  console.error(`[Agent] FATAL: ${err instanceof Error ? err.message : String(err)}`);
  console.error(`[Agent]   Fix the value in ${envResult.path} or the environment and restart.`);
  process.exit(1);
}

const log = initAgentLogging({
  minLevel: config.logLevel,
  logDir: logDirFor(config.cacheDir),
});

if (envResult.error) {
  log.warn("Could not read .env, using the environment only", { path: envResult.path, error: envResult.error.message });
}

// ============================================
// TERMINAL
// ============================================

const rl = readline.createInterface({
  input: process.stdin,
  output: process.stdout,
});

const prompter = new TerminalPrompter(text => process.stdout.write(text));

/** Run an excursion command attached to this terminal; resolves on exit */
function launchCommand(command: string[], signal: AbortSignal): Promise<void> {
  const [file, ...args] = command;
  return new Promise((resolve, reject) => {
    rl.pause();
    const child = spawn(file, args, { stdio: "inherit", cwd: config.cacheDir, signal });
    child.on("error", err => {
      rl.resume();
      reject(err);
    });
    child.on("exit", () => {
      rl.resume();
      resolve();
    });
  });
}

const io: ItemIO = {
  ask: (question, signal) => prompter.ask(question, signal),
  launch: launchCommand,
};

// ============================================
// ENGINE
// ============================================

let engine: Engine;
try {
  const specs = loadItemSpecs(path.join(config.cacheDir, ITEMS_FILENAME));
  engine = new Engine({
    config,
    items: buildItemDefs(specs, io, config.cacheDir),
    confirm: question => prompter.confirm(question),
  });
} catch (err) {
  log.fatal("Could not load items", err);
  process.exit(1);
}

const started = engine.start();
if (!started.started) {
  console.error(`[Agent] Another agent (pid ${started.holder.pid}) is already using ${config.cacheDir}`);
  process.exit(1);
}

// ============================================
// SHUTDOWN
// ============================================

let shuttingDown = false;

function shutdown(code: number): void {
  if (shuttingDown) return;
  shuttingDown = true;
  prompter.close();
  engine.stop().then(
    () => {
      console.log("[Agent] Goodbye!");
      log.close();
      process.exit(code);
    },
    err => {
      log.error("Shutdown failed", err);
      log.close();
      process.exit(1);
    },
  );
}

process.on("SIGINT", () => shutdown(0));
process.on("SIGTERM", () => shutdown(0));
rl.on("close", () => shutdown(0));

startCli({ engine, prompter, rl, onQuit: () => rl.close() });
