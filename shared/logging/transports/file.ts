/**
 * File Transport
 *
 * Appends JSON lines to <logDir>/<filename>-YYYY-MM-DD.log, rotating
 * by size. Each write opens and closes the file, so nothing stays open
 * between entries.
 */

import * as fs from "fs";
import * as path from "path";
import type { LogTransport, LogEntry, LogLevel } from "../types.js";

export interface FileTransportOptions {
  minLevel?: LogLevel;
  logDir: string;
  /** Base filename (default: "idlewise") */
  filename?: string;
  /** Max file size in bytes before rotation (default: 10MB) */
  maxSize?: number;
  /** Max number of rotated files to keep (default: 5) */
  maxFiles?: number;
}

export class FileTransport implements LogTransport {
  name = "file";
  minLevel: LogLevel;
  private logDir: string;
  private filename: string;
  private maxSize: number;
  private maxFiles: number;

  constructor(options: FileTransportOptions) {
    this.minLevel = options.minLevel || "debug";
    this.logDir = options.logDir;
    this.filename = options.filename || "idlewise";
    this.maxSize = options.maxSize || 10 * 1024 * 1024;
    this.maxFiles = options.maxFiles || 5;
    fs.mkdirSync(this.logDir, { recursive: true });
  }

  currentPath(now: Date = new Date()): string {
    const date = now.toISOString().slice(0, 10);
    return path.join(this.logDir, `${this.filename}-${date}.log`);
  }

  log(entry: LogEntry): void {
    const line = JSON.stringify(entry) + "\n";
    const target = this.currentPath();

    if (this.sizeOf(target) + Buffer.byteLength(line) > this.maxSize) {
      this.rotate(target);
    }

    fs.appendFileSync(target, line, "utf-8");
  }

  private sizeOf(filePath: string): number {
    try {
      return fs.statSync(filePath).size;
    } catch {
      return 0;
    }
  }

  /** target → target.1 → target.2 …, dropping anything past maxFiles */
  private rotate(target: string): void {
    const oldest = `${target}.${this.maxFiles}`;
    if (fs.existsSync(oldest)) {
      fs.unlinkSync(oldest);
    }
    for (let i = this.maxFiles - 1; i >= 1; i--) {
      const from = `${target}.${i}`;
      if (fs.existsSync(from)) {
        fs.renameSync(from, `${target}.${i + 1}`);
      }
    }
    if (fs.existsSync(target)) {
      fs.renameSync(target, `${target}.1`);
    }
  }
}
