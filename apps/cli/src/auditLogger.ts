import { appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';

import type { ExecutionTelemetry } from './types.js';

export interface AuditLoggerDependencies {
  appendFileImpl?: (path: string, data: string) => Promise<void>;
  mkdirImpl?: (path: string) => Promise<unknown>;
  onError?: (message: string) => void;
}

/** Appends one JSON line per command run. A failed write is reported, never fatal. */
export class AuditLogger {
  private readonly appendFileImpl: (path: string, data: string) => Promise<void>;

  private readonly mkdirImpl: (path: string) => Promise<unknown>;

  private readonly onError: (message: string) => void;

  constructor(deps: AuditLoggerDependencies = {}) {
    this.appendFileImpl = deps.appendFileImpl ?? ((path, data) => appendFile(path, data, 'utf-8'));
    this.mkdirImpl = deps.mkdirImpl ?? ((path) => mkdir(path, { recursive: true }));
    this.onError = deps.onError ?? ((message) => console.error(message));
  }

  async record(entry: ExecutionTelemetry, filePath?: string): Promise<boolean> {
    if (!filePath) {
      return false;
    }

    try {
      await this.mkdirImpl(dirname(filePath));
      await this.appendFileImpl(filePath, `${JSON.stringify(entry)}\n`);
      return true;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.onError(`estate-lens: could not write audit log ${filePath}: ${reason}`);
      return false;
    }
  }
}
