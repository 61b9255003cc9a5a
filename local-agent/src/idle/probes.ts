/**
 * Idle Probes
 *
 * The monitor only needs `currentIdleSeconds()`. Which implementation
 * backs it depends on the platform:
 *
 * - x11:      `xprintidle` (milliseconds since last X input event)
 * - activity: seconds since the host last called notifyActivity();
 *             only used when explicitly configured
 * - none:     no probe, the monitor stays off
 */

import { execFile } from "child_process";
import { promisify } from "util";

const execFileAsync = promisify(execFile);

export type IdleProbe = () => number | Promise<number>;
export type IdleProbeKind = "auto" | "x11" | "activity" | "off";

// ============================================
// X11
// ============================================

export type CommandRunner = (command: string, args: string[]) => Promise<string>;

const defaultRunner: CommandRunner = async (command, args) => {
  const { stdout } = await execFileAsync(command, args, { timeout: 5_000 });
  return stdout;
};

export function createX11Probe(run: CommandRunner = defaultRunner): IdleProbe {
  return async () => {
    const stdout = await run("xprintidle", []);
    const ms = Number.parseInt(stdout.trim(), 10);
    if (Number.isNaN(ms)) {
      throw new Error(`xprintidle returned "${stdout.trim()}"`);
    }
    return ms / 1000;
  };
}

// ============================================
// ACTIVITY
// ============================================

export interface ActivityProbe {
  probe: IdleProbe;
  /** Call on any user interaction */
  notifyActivity(): void;
}

export function createActivityProbe(): ActivityProbe {
  let lastActivityAt = Date.now();
  return {
    probe: () => (Date.now() - lastActivityAt) / 1000,
    notifyActivity: () => {
      lastActivityAt = Date.now();
    },
  };
}

// ============================================
// SELECTION
// ============================================

export type SelectedProbe =
  | { kind: "x11"; probe: IdleProbe }
  | { kind: "activity"; probe: IdleProbe; notifyActivity: () => void }
  | { kind: "none" };

/**
 * Prefer the X11 query, fall back to the in-process activity measure only
 * when opted in, otherwise disable idle tracking.
 */
export function selectIdleProbe(
  kind: IdleProbeKind,
  env: NodeJS.ProcessEnv = process.env,
  run?: CommandRunner,
): SelectedProbe {
  if (kind === "x11" || (kind === "auto" && env.DISPLAY)) {
    return { kind: "x11", probe: createX11Probe(run) };
  }
  if (kind === "activity") {
    const activity = createActivityProbe();
    return { kind: "activity", probe: activity.probe, notifyActivity: activity.notifyActivity };
  }
  return { kind: "none" };
}
