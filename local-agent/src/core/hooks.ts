/**
 * Hook Lists
 *
 * Ordered handlers registered at configuration time and run in sequence.
 * A failing handler is logged and the rest still run.
 */

import type { ILogger } from "@idlewise/shared/logging";

export type HookHandler<T> = (arg: T) => void | Promise<void>;

interface NamedHook<T> {
  name: string;
  handler: HookHandler<T>;
}

export class HookList<T = void> {
  private hooks: NamedHook<T>[] = [];

  constructor(private label: string, private log: ILogger) {}

  add(name: string, handler: HookHandler<T>): this {
    this.hooks.push({ name, handler });
    return this;
  }

  remove(name: string): boolean {
    const before = this.hooks.length;
    this.hooks = this.hooks.filter(h => h.name !== name);
    return this.hooks.length !== before;
  }

  names(): string[] {
    return this.hooks.map(h => h.name);
  }

  get size(): number {
    return this.hooks.length;
  }

  /** Run every handler in order; returns the names of the ones that threw */
  async run(arg: T): Promise<string[]> {
    const failed: string[] = [];
    for (const { name, handler } of [...this.hooks]) {
      try {
        await handler(arg);
      } catch (err) {
        failed.push(name);
        this.log.error(`${this.label} hook "${name}" failed`, err);
      }
    }
    return failed;
  }
}
