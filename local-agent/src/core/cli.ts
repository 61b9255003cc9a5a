/**
 * CLI Interface: interactive readline prompt for local terminal usage.
 *
 * One readline interface serves two masters: operator commands, and the
 * questions item bodies ask during a session. A line goes to a pending
 * question first; otherwise it is parsed as a command. Sessions run in
 * the background so `abort` and `status` stay usable while one is active.
 */

import type * as readline from "readline";
import type { LogEntry } from "@idlewise/shared/logging";
import type { Engine, EngineStatus } from "../engine.js";
import { formatTimestamp } from "../eventlog/index.js";
import type { RunSummary } from "../scheduler/types.js";

// ============================================
// COMMANDS
// ============================================

export type CliCommand =
  | { name: "new" }
  | { name: "force" }
  | { name: "resume" }
  | { name: "abort" }
  | { name: "status" }
  | { name: "logs"; count: number }
  | { name: "disable"; fn: string }
  | { name: "enable"; fn: string }
  | { name: "forget"; variable: string }
  | { name: "help" }
  | { name: "quit" }
  | { name: "empty" }
  | { name: "invalid"; message: string };

export const HELP_TEXT = `
Commands:
  - 'new'           - Run the items that are due now
  - 'force'         - Run every enabled item
  - 'resume'        - Continue a cancelled or aborted run
  - 'abort'         - Abandon the current run
  - 'status'        - Show idle state, queue and items
  - 'logs [n]'      - Show the last n log entries (default 20)
  - 'disable <fn>'  - Stop scheduling an item
  - 'enable <fn>'   - Schedule a disabled item again
  - 'forget <var>'  - Drop a persisted variable from the log
  - 'quit'          - Save state and exit

While an item is asking: answer, 'n' to cancel, '/skip' to skip, '/abort' to stop.
`;

const DEFAULT_LOG_COUNT = 20;

export function parseCommand(input: string): CliCommand {
  const [word = "", ...rest] = input.trim().split(/\s+/);
  const name = word.toLowerCase();
  const arg = rest.join(" ");

  switch (name) {
    case "":
      return { name: "empty" };
    case "new":
      return { name: "new" };
    case "force":
      return { name: "force" };
    case "resume":
      return { name: "resume" };
    case "abort":
      return { name: "abort" };
    case "status":
      return { name: "status" };
    case "logs": {
      if (!arg) return { name: "logs", count: DEFAULT_LOG_COUNT };
      const count = Number(arg);
      return Number.isInteger(count) && count > 0
        ? { name: "logs", count }
        : { name: "invalid", message: "Usage: logs [count]" };
    }
    case "help":
      return { name: "help" };
    case "quit":
    case "exit":
      return { name: "quit" };
    case "disable":
      return arg ? { name: "disable", fn: arg } : { name: "invalid", message: "Usage: disable <fn>" };
    case "enable":
      return arg ? { name: "enable", fn: arg } : { name: "invalid", message: "Usage: enable <fn>" };
    case "forget":
      return arg ? { name: "forget", variable: arg } : { name: "invalid", message: "Usage: forget <var>" };
    default:
      return { name: "invalid", message: `Unknown command "${word}". Type 'help' for commands.` };
  }
}

// ============================================
// FORMATTING
// ============================================

export function formatSummary(summary: RunSummary): string[] {
  const lines = [`[Agent] Run ${summary.runId} ${summary.status}`];
  const groups: Array<[string, string[]]> = [
    ["done", summary.succeeded],
    ["dismissed", summary.dismissed],
    ["skipped", summary.skipped],
    ["timed out", summary.timedOut],
    ["failed", summary.failed],
    ["disabled", summary.disabled],
    ["still queued", summary.remaining],
  ];
  for (const [label, fns] of groups) {
    if (fns.length > 0) lines.push(`  ${label}: ${fns.join(", ")}`);
  }
  return lines;
}

export function formatStatus(status: EngineStatus): string[] {
  const lines: string[] = [];
  const { scheduler, idle } = status;

  lines.push(idle
    ? `[Agent] Idle: ${idle.state} (last online ${formatTimestamp(idle.lastOnline)})`
    : "[Agent] Idle: tracking off");

  lines.push(scheduler.running
    ? `[Agent] Run: ${scheduler.runId ?? "?"} on ${scheduler.current ?? "-"}`
    : "[Agent] Run: none");
  lines.push(`[Agent] Queue: ${scheduler.queue.length > 0 ? scheduler.queue.join(", ") : "(empty)"}`);

  const width = Math.max(0, ...scheduler.items.map(item => item.fn.length));
  for (const item of scheduler.items) {
    let state: string;
    if (!item.enabled) {
      state = "disabled";
    } else if (!item.verdict) {
      state = "unknown";
    } else if (item.verdict.pending) {
      state = "pending";
    } else {
      state = `waiting (${item.verdict.reason})`;
    }
    const called = item.lastCalled !== null ? `, last called ${formatTimestamp(item.lastCalled * 1000)}` : "";
    lines.push(`  ${item.fn.padEnd(width)}  ${state}, dismissals ${item.dismissals}${called}`);
  }
  return lines;
}

export function formatLogEntry(entry: LogEntry): string {
  const run = entry.runId ? ` (${entry.runId})` : "";
  return `  ${entry.timestamp.slice(11, 19)} ${entry.level.toUpperCase().padEnd(5)} [${entry.component}]${run} ${entry.message}`;
}

function errorLine(err: unknown): string {
  return `[Agent] ${err instanceof Error ? err.message : String(err)}`;
}

// ============================================
// EXECUTION
// ============================================

/** Run one command against the engine. Quit is left to the caller. */
export async function executeCommand(engine: Engine, command: CliCommand): Promise<string[]> {
  try {
    switch (command.name) {
      case "empty":
      case "quit":
        return [];
      case "help":
        return [HELP_TEXT];
      case "invalid":
        return [`[Agent] ${command.message}`];
      case "new":
        return formatSummary(await engine.startSession());
      case "force":
        return formatSummary(await engine.forceSession());
      case "resume":
        return formatSummary(await engine.resume());
      case "abort":
        return [engine.abort() ? "[Agent] Aborting run" : "[Agent] Nothing is running"];
      case "status":
        return formatStatus(engine.status());
      case "logs": {
        const entries = engine.recentLogs(command.count);
        return entries.length > 0 ? entries.map(formatLogEntry) : ["[Agent] No log entries yet"];
      }
      case "disable":
        engine.disable(command.fn);
        return [`[Agent] Disabled ${command.fn}`];
      case "enable":
        engine.enable(command.fn);
        return [`[Agent] Enabled ${command.fn}`];
      case "forget": {
        const removed = engine.forget(command.variable);
        return [`[Agent] Forgot ${command.variable} (${removed} row${removed === 1 ? "" : "s"})`];
      }
    }
  } catch (err) {
    return [errorLine(err)];
  }
}

// ============================================
// TERMINAL PROMPTER
// ============================================

interface PendingQuestion {
  resolve(answer: string): void;
  reject(err: Error): void;
  cleanup(): void;
}

/** Questions from item bodies and disable prompts, answered by the next line */
export class TerminalPrompter {
  private pending: PendingQuestion | null = null;

  constructor(private write: (text: string) => void) {}

  ask(question: string, signal?: AbortSignal): Promise<string> {
    if (this.pending) {
      return Promise.reject(new Error("Another question is already waiting for an answer"));
    }
    if (signal?.aborted) {
      return Promise.reject(new Error("Aborted"));
    }

    return new Promise<string>((resolve, reject) => {
      const onAbort = (): void => {
        this.pending = null;
        reject(new Error("Aborted"));
      };
      signal?.addEventListener("abort", onAbort, { once: true });

      this.pending = {
        resolve,
        reject,
        cleanup: () => signal?.removeEventListener("abort", onAbort),
      };
      this.write(question);
    });
  }

  async confirm(question: string): Promise<boolean> {
    const answer = await this.ask(`${question} [y/N] `);
    return /^y(es)?$/i.test(answer.trim());
  }

  isWaiting(): boolean {
    return this.pending !== null;
  }

  /** Deliver a line to the waiting question. False when none is waiting. */
  answer(line: string): boolean {
    const pending = this.pending;
    if (!pending) return false;
    this.pending = null;
    pending.cleanup();
    pending.resolve(line);
    return true;
  }

  /** Fail the waiting question, e.g. on shutdown */
  close(): void {
    const pending = this.pending;
    if (!pending) return;
    this.pending = null;
    pending.cleanup();
    pending.reject(new Error("Prompt closed"));
  }
}

// ============================================
// PROMPT LOOP
// ============================================

export interface CliOptions {
  engine: Engine;
  prompter: TerminalPrompter;
  rl: readline.Interface;
  print?: (line: string) => void;
  onQuit: () => void;
}

/** Route every input line; sessions run without blocking the prompt */
export function startCli(options: CliOptions): void {
  const { engine, prompter, rl, onQuit } = options;
  const print = options.print ?? ((line: string) => console.log(line));

  rl.setPrompt("> ");

  const printAll = (lines: string[]): void => {
    for (const line of lines) print(line);
    if (!prompter.isWaiting()) rl.prompt();
  };

  rl.on("line", input => {
    engine.notifyActivity();

    if (prompter.isWaiting()) {
      if (input.trim() === "/abort") {
        engine.abort();
        prompter.answer("");
        return;
      }
      prompter.answer(input);
      return;
    }

    const command = parseCommand(input);
    if (command.name === "quit") {
      onQuit();
      return;
    }

    executeCommand(engine, command).then(printAll, err => printAll([errorLine(err)]));
  });

  print(HELP_TEXT);
  rl.prompt();
}
