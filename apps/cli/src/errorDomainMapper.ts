import { isChatCoreError, type ChatCoreErrorCode } from '@estate-lens/chat-core';

import { InputResolveError } from './inputResolver.js';
import { CliUsageError, ReplyInterpretationError, SearchRunError } from './errors.js';
import type { CommandOutput } from './types.js';

interface MappedError {
  exitCode: number;
  output: CommandOutput;
  errorCode: string;
}

interface CoreErrorMapping {
  code: string;
  exitCode: number;
  suggestions: string[];
}

const CORE_ERROR_MAPPINGS: Record<ChatCoreErrorCode, CoreErrorMapping> = {
  INVALID_ARGUMENT: {
    code: 'E_INVALID_ARGUMENT',
    exitCode: 2,
    suggestions: ['Check the query, model name and sampling options'],
  },
  NO_JSON_FOUND: {
    code: 'E_NO_JSON',
    exitCode: 1,
    suggestions: ['Retry the search; models sometimes answer in prose instead of JSON'],
  },
  MALFORMED_JSON: {
    code: 'E_MALFORMED_JSON',
    exitCode: 1,
    suggestions: ['Retry the search; models sometimes answer in prose instead of JSON'],
  },
  NETWORK_TIMEOUT: {
    code: 'E_TIMEOUT',
    exitCode: 1,
    suggestions: ['Try again later or raise --timeout'],
  },
  NETWORK_ERROR: {
    code: 'E_NETWORK',
    exitCode: 1,
    suggestions: ['Check your network connection and the endpoint URL'],
  },
  AUTH_ERROR: {
    code: 'E_AUTH',
    exitCode: 1,
    suggestions: ['Check the API key passed with --api-key or set in the profile environment variable'],
  },
  RATE_LIMITED: {
    code: 'E_RATE_LIMITED',
    exitCode: 1,
    suggestions: ['Wait a moment before retrying'],
  },
  REMOTE_ERROR: {
    code: 'E_REMOTE',
    exitCode: 1,
    suggestions: [],
  },
};

export class ErrorDomainMapper {
  map(error: unknown): MappedError {
    if (error instanceof SearchRunError) {
      return this.map(error.cause);
    }

    if (error instanceof CliUsageError || error instanceof InputResolveError) {
      return this.build('E_USAGE', error.message, 2, ["Run 'estate-lens --help' to list the available options"]);
    }

    if (isConfigError(error)) {
      return this.build('CONFIG_ERROR', error.message, 1, ["Run 'estate-lens config list' to review your profiles"]);
    }

    if (error instanceof ReplyInterpretationError) {
      const mapping = CORE_ERROR_MAPPINGS[error.code];
      return this.build(mapping.code, error.message, mapping.exitCode, mapping.suggestions, error.rawReply);
    }

    if (isChatCoreError(error)) {
      const mapping = CORE_ERROR_MAPPINGS[error.code];
      return this.build(mapping.code, error.message, mapping.exitCode, mapping.suggestions);
    }

    if (error instanceof Error) {
      return this.build('E_UNEXPECTED', error.message, 1);
    }

    return this.build('E_UNEXPECTED', String(error), 1);
  }

  private build(
    code: string,
    message: string,
    exitCode: number,
    suggestions: string[] = [],
    detail?: string,
  ): MappedError {
    return {
      exitCode,
      errorCode: code,
      output: {
        kind: 'error',
        code,
        message,
        suggestions,
        ...(detail === undefined ? {} : { detail }),
      },
    };
  }
}

function isConfigError(error: unknown): error is Error {
  return error instanceof Error && error.name === 'ConfigError';
}
