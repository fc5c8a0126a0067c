import type { ExtractionFailure } from '@estate-lens/chat-core';

import type { ExecutionTelemetry } from './types.js';

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/** What a command already knew when it failed: usage of paid calls and the profile's log file. */
export interface FailureReport {
  telemetry: Partial<ExecutionTelemetry>;
  logFile?: string;
}

export class ReplyInterpretationError extends Error {
  readonly code: ExtractionFailure['code'];

  readonly rawReply: string;

  readonly report: FailureReport;

  constructor(failure: ExtractionFailure, report: FailureReport = { telemetry: {} }) {
    super(failure.message);
    this.name = 'ReplyInterpretationError';
    this.code = failure.code;
    this.rawReply = failure.rawReply;
    this.report = report;
  }
}

/** Wraps an error raised once a profile was resolved; the mapper reports the cause. */
export class SearchRunError extends Error {
  readonly report: FailureReport;

  constructor(cause: unknown, report: FailureReport) {
    super(cause instanceof Error ? cause.message : String(cause), { cause });
    this.name = 'SearchRunError';
    this.report = report;
  }
}

export function failureReportOf(error: unknown): FailureReport | undefined {
  if (error instanceof ReplyInterpretationError || error instanceof SearchRunError) {
    return error.report;
  }
  return undefined;
}
