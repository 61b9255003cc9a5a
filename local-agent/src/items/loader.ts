/**
 * Item Loader
 *
 * Reads `<cacheDir>/items.json` and turns each entry into an ItemDef whose
 * body talks to the operator through an injected ItemIO.
 *
 * Entry shape:
 *   { "fn": "water", "prompt": "Glasses of water so far?", "dataset": "water.tsv",
 *     "minHoursWait": 3, "maxEntriesPerDay": 4 }
 *   { "fn": "journal", "kind": "excursion", "command": ["vim", "journal.md"] }
 *
 * Query answers: "n" or empty cancels, "/skip" skips, anything else is a
 * success and is appended to the dataset as `[date, answer]`. An answer the
 * dataset cannot hold (a tab inside it) lands in `<dataset>_errors` and the
 * call fails.
 */

import * as fs from "fs";
import { appendRecord, logicalDate } from "../eventlog/index.js";
import { ConfigError, EventLogError } from "../errors.js";
import { createComponentLogger } from "../logging.js";
import { resolveDatasetPath } from "./registry.js";
import { CANCELLED, SKIPPED, SUCCESS } from "./types.js";
import type { ExcursionItemDef, ItemDef, ItemKind, PromptResult, QueryItemDef } from "./types.js";

// ============================================
// TYPES
// ============================================

export interface ItemSpec {
  fn: string;
  kind: ItemKind;
  prompt?: string;
  command?: string[];
  description?: string;
  dataset?: string;
  minHoursWait?: number;
  maxCallsPerDay?: number;
  maxEntriesPerDay?: number;
  maxSuccessesPerDay?: number;
  lookupPostedTime?: boolean;
}

/** Terminal side of item bodies */
export interface ItemIO {
  ask(question: string, signal: AbortSignal): Promise<string>;
  /** Run an external command; resolves when it exits */
  launch(command: string[], signal: AbortSignal): Promise<void>;
}

const SOURCE_KEY = "items.json";

// ============================================
// PARSING
// ============================================

function optionalNumber(entry: Record<string, unknown>, key: string, fn: string): number | undefined {
  const value = entry[key];
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
    throw new ConfigError(SOURCE_KEY, `"${fn}".${key} must be a non-negative number`);
  }
  return value;
}

function optionalString(entry: Record<string, unknown>, key: string, fn: string): string | undefined {
  const value = entry[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string" || value.trim() === "") {
    throw new ConfigError(SOURCE_KEY, `"${fn}".${key} must be a non-empty string`);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isItemKind(value: unknown): value is ItemKind {
  return value === "query" || value === "excursion";
}

function parseEntry(entry: unknown, index: number): ItemSpec {
  if (!isRecord(entry)) {
    throw new ConfigError(SOURCE_KEY, `entry ${index} is not an object`);
  }

  const fn = entry.fn;
  if (typeof fn !== "string" || !/^[\w.-]+$/.test(fn)) {
    throw new ConfigError(SOURCE_KEY, `entry ${index} needs an "fn" of letters, digits, "_", "." or "-"`);
  }

  const kind = entry.kind ?? "query";
  if (!isItemKind(kind)) {
    throw new ConfigError(SOURCE_KEY, `"${fn}".kind must be "query" or "excursion"`);
  }

  let command: string[] | undefined;
  if (kind === "excursion") {
    const raw = entry.command;
    if (!Array.isArray(raw) || raw.length === 0 || !raw.every(part => typeof part === "string")) {
      throw new ConfigError(SOURCE_KEY, `"${fn}" is an excursion and needs a "command" array of strings`);
    }
    command = raw.filter((part): part is string => typeof part === "string");
  }

  const lookupPostedTime = entry.lookupPostedTime;
  if (lookupPostedTime !== undefined && typeof lookupPostedTime !== "boolean") {
    throw new ConfigError(SOURCE_KEY, `"${fn}".lookupPostedTime must be a boolean`);
  }

  return {
    fn,
    kind,
    command,
    prompt: optionalString(entry, "prompt", fn),
    description: optionalString(entry, "description", fn),
    dataset: optionalString(entry, "dataset", fn),
    minHoursWait: optionalNumber(entry, "minHoursWait", fn),
    maxCallsPerDay: optionalNumber(entry, "maxCallsPerDay", fn),
    maxEntriesPerDay: optionalNumber(entry, "maxEntriesPerDay", fn),
    maxSuccessesPerDay: optionalNumber(entry, "maxSuccessesPerDay", fn),
    lookupPostedTime,
  };
}

export function parseItemSpecs(raw: unknown): ItemSpec[] {
  if (!Array.isArray(raw)) {
    throw new ConfigError(SOURCE_KEY, "expected a JSON array of items");
  }
  return raw.map(parseEntry);
}

/** Missing file → no items (with a warning). Invalid content throws ConfigError. */
export function loadItemSpecs(filePath: string): ItemSpec[] {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      createComponentLogger("items").warn("No items file, nothing to schedule", { filePath });
      return [];
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(SOURCE_KEY, `not valid JSON (${err instanceof Error ? err.message : String(err)})`);
  }
  return parseItemSpecs(parsed);
}

// ============================================
// BODIES
// ============================================

export function interpretAnswer(answer: string): PromptResult {
  const trimmed = answer.trim();
  if (trimmed === "/skip") return SKIPPED;
  if (trimmed === "" || trimmed.toLowerCase() === "n") return CANCELLED;
  return SUCCESS;
}

function queryDef(spec: ItemSpec, io: ItemIO, cacheDir: string): QueryItemDef {
  const datasetPath = spec.dataset ? resolveDatasetPath(cacheDir, spec.dataset) : undefined;
  const question = spec.prompt ?? `${spec.fn}?`;

  return {
    ...limitsOf(spec),
    kind: "query",
    run: async ctx => {
      const answer = await io.ask(`${question} `, ctx.signal);
      const result = interpretAnswer(answer);
      if (result.status === "success" && datasetPath) {
        const appended = appendRecord(datasetPath, [logicalDate(), answer.trim()]);
        if (!appended.ok) {
          throw new EventLogError(datasetPath, `Answer not recorded, diverted to ${appended.errorPath}`);
        }
      }
      return result;
    },
  };
}

function excursionDef(spec: ItemSpec, io: ItemIO): ExcursionItemDef {
  const command = spec.command ?? [];

  return {
    ...limitsOf(spec),
    kind: "excursion",
    run: async ctx => {
      const resource = ctx.open(command.join(" "));
      io.launch(command, ctx.signal).then(
        () => resource.close(),
        err => {
          ctx.log.warn(`Excursion command failed`, { error: err instanceof Error ? err.message : String(err) });
          ctx.cancel();
        },
      );
    },
  };
}

function limitsOf(spec: ItemSpec) {
  return {
    fn: spec.fn,
    description: spec.description,
    dataset: spec.dataset,
    minHoursWait: spec.minHoursWait,
    maxCallsPerDay: spec.maxCallsPerDay,
    maxEntriesPerDay: spec.maxEntriesPerDay,
    maxSuccessesPerDay: spec.maxSuccessesPerDay,
    lookupPostedTime: spec.lookupPostedTime,
  };
}

export function buildItemDefs(specs: ItemSpec[], io: ItemIO, cacheDir: string): ItemDef[] {
  return specs.map(spec => spec.kind === "excursion" ? excursionDef(spec, io) : queryDef(spec, io, cacheDir));
}
