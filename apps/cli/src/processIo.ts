import process from 'node:process';

import type { ProcessIO } from './types.js';

type NodeLikeProcess = Pick<NodeJS.Process, 'stdout' | 'stderr' | 'exitCode'>;

export interface ObservableProcess {
  on(event: 'uncaughtException' | 'unhandledRejection', listener: (reason: unknown) => void): unknown;
  exitCode?: number | string | undefined;
  exit(code: number): void;
}

export function createNodeProcessIO(proc: NodeLikeProcess = process): ProcessIO {
  return {
    writeStdout(message: string) {
      proc.stdout.write(message);
    },
    writeStderr(message: string) {
      proc.stderr.write(message);
    },
    setExitCode(code: number) {
      proc.exitCode = code;
    },
  };
}

const observedProcesses = new WeakSet<ObservableProcess>();

/**
 * Last-resort reporting for failures that escape the command pipeline.
 * An uncaught exception exits with code 1 at once; an unhandled rejection
 * only sets the exit code and lets pending work finish.
 */
export function registerProcessObservers(
  proc: ObservableProcess = process,
  log: (...args: unknown[]) => void = console.error,
): void {
  if (observedProcesses.has(proc)) {
    return;
  }

  proc.on('uncaughtException', (error) => {
    log('estate-lens: uncaught exception', error);
    proc.exit(1);
  });

  proc.on('unhandledRejection', (reason) => {
    log('estate-lens: unhandled rejection', reason);
    proc.exitCode = 1;
  });

  observedProcesses.add(proc);
}
