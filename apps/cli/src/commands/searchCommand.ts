import {
  DEFAULT_TIMEOUT_MS,
  buildChatRequest,
  createSearchRequest,
  createSessionTally,
  isChatCoreError,
  recordCost,
  searchProperty,
  type ChatCoreError,
  type ExtractionFailure,
  type LLMClient,
  type SearchOutcome,
  type SearchRequest,
  type SessionTally,
  type TaskKind,
} from '@estate-lens/chat-core';

import { CliUsageError, ReplyInterpretationError, SearchRunError } from '../errors.js';
import type { InputResolver, TextSource } from '../inputResolver.js';
import type { ProfileResolver } from '../config/types.js';
import type {
  CliCommandContext,
  CommandDescriptor,
  CommandHandler,
  CommandResult,
  ExecutionTelemetry,
} from '../types.js';
import { normalize, parseDecimal, parseFormat, parseInteger, requireValue } from './argUtils.js';
import {
  renderCost,
  renderFailure,
  renderImageUrls,
  renderPropertyRecord,
  renderSessionTotal,
} from './searchRendering.js';

export interface SearchCommandOptions {
  queries: string[];
  positional: string[];
  file?: string;
  baseUrl?: string;
  apiKey?: string;
  model?: string;
  profile?: string;
  timeoutMs?: number;
  maxTokens?: number;
  temperature?: number;
  maxImages: number;
  format: 'text' | 'json';
  showRaw: boolean;
  help?: boolean;
}

export interface LlmClientOptions {
  baseUrl: string;
  apiKey: string;
  model: string;
  timeoutMs: number;
}

export interface SearchCommandDependencies {
  inputResolver: Pick<InputResolver, 'resolve'>;
  profiles: ProfileResolver;
  llmFactory: (options: LlmClientOptions) => LLMClient;
  searchExecutor?: typeof searchProperty;
}

type QueryEntry =
  | { kind: 'outcome'; outcome: SearchOutcome }
  | { kind: 'error'; request: SearchRequest; error: ChatCoreError };

interface SearchVariant {
  name: 'search' | 'images';
  taskKind: TaskKind;
  summary: string;
}

const SEARCH_VARIANT: SearchVariant = {
  name: 'search',
  taskKind: 'PROPERTY_FACTS',
  summary: 'Ask the model for pricing, builder, amenities and images of a property',
};

const IMAGES_VARIANT: SearchVariant = {
  name: 'images',
  taskKind: 'IMAGE_SEARCH',
  summary: 'Ask the model for direct image URLs of a property',
};

function buildHelpMessage(variant: SearchVariant): string {
  const imageOption =
    variant.taskKind === 'IMAGE_SEARCH'
      ? '\n  --max <n>               Keep at most n image URLs (default: 0 = all)'
      : '';

  return `estate-lens ${variant.name} - ${variant.summary}

Usage:
  estate-lens [global-options] ${variant.name} [options] "Project name, locality, city"
  estate-lens [global-options] ${variant.name} [options] --query "first" --query "second"
  estate-lens [global-options] ${variant.name} [options] --file ./query.txt
  echo "Project name" | estate-lens ${variant.name} [options]

Options:
  --query <text>          Query to send; repeat to run several queries one after another
  --file <path>           Read the query from a file
  --model <name>          Model identifier (default: profile model)
  --base-url <url>        Chat-completion endpoint base URL (default: profile endpoint)
  --api-key <key>         API key (default: the profile's API key environment variable)
  --profile <name>        Connection profile (default: config.json defaultProfile)
  --timeout <ms>          Request timeout in milliseconds (default: profile or ${DEFAULT_TIMEOUT_MS})
  --max-tokens <n>        Completion token limit
  --temperature <x>       Sampling temperature between 0 and 2${imageOption}
  --format <text|json>    Output format (default: text)
  --show-raw              Include the raw model reply in the output
  --help                  Show this help`;
}

function parseSearchCommandArgs(args: string[]): SearchCommandOptions {
  const parsed: SearchCommandOptions = {
    queries: [],
    positional: [],
    maxImages: 0,
    format: 'text',
    showRaw: false,
  };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];

    switch (arg) {
      case '--query':
        parsed.queries.push(requireValue(args, ++i, arg));
        break;
      case '--file':
        parsed.file = requireValue(args, ++i, arg);
        break;
      case '--base-url':
        parsed.baseUrl = requireValue(args, ++i, arg);
        break;
      case '--api-key':
        parsed.apiKey = requireValue(args, ++i, arg);
        break;
      case '--model':
        parsed.model = requireValue(args, ++i, arg);
        break;
      case '--profile':
        parsed.profile = requireValue(args, ++i, arg);
        break;
      case '--timeout':
        parsed.timeoutMs = parseInteger(arg, requireValue(args, ++i, arg), 1);
        break;
      case '--max-tokens':
        parsed.maxTokens = parseInteger(arg, requireValue(args, ++i, arg), 1);
        break;
      case '--temperature':
        parsed.temperature = parseDecimal(arg, requireValue(args, ++i, arg), 0, 2);
        break;
      case '--max':
        parsed.maxImages = parseInteger(arg, requireValue(args, ++i, arg), 0);
        break;
      case '--format':
        parsed.format = parseFormat(requireValue(args, ++i, arg));
        break;
      case '--show-raw':
        parsed.showRaw = true;
        break;
      case '--help':
      case '-h':
        parsed.help = true;
        break;
      default:
        if (arg.startsWith('--')) {
          throw new CliUsageError(`Unknown option: ${arg}`);
        }
        parsed.positional.push(arg);
        break;
    }
  }

  return parsed;
}

async function resolveQueries(
  parsed: SearchCommandOptions,
  deps: SearchCommandDependencies,
): Promise<string[]> {
  const sources: TextSource[] = parsed.queries.map((value): TextSource => ({ kind: 'inline', value }));

  if (parsed.positional.length > 0) {
    sources.push({ kind: 'inline', value: parsed.positional.join(' ') });
  }

  if (parsed.file) {
    sources.push({ kind: 'file', path: parsed.file });
  }

  if (sources.length === 0) {
    sources.push({ kind: 'stdin' });
  }

  const queries: string[] = [];
  for (const source of sources) {
    const resolved = await deps.inputResolver.resolve(source);
    if (!resolved.text) {
      throw new CliUsageError('query must not be empty');
    }
    queries.push(resolved.text);
  }

  return queries;
}

function serializeOutcome(outcome: SearchOutcome, showRaw: boolean): Record<string, unknown> {
  const { request, result } = outcome;
  const base: Record<string, unknown> = {
    query: request.query,
    model: request.model,
    taskKind: request.taskKind,
    cost: outcome.cost,
    usageApproximated: outcome.usageApproximated,
  };

  if (result.kind === 'images') {
    base.images = result.urls;
  } else if (result.extraction.ok) {
    base.record = result.extraction.record;
    base.warnings = result.extraction.warnings;
    if (result.extraction.recoveredBy) {
      base.recoveredBy = result.extraction.recoveredBy;
    }
  } else {
    base.failure = {
      code: result.extraction.failure.code,
      message: result.extraction.failure.message,
    };
  }

  if (showRaw || (result.kind === 'property' && !result.extraction.ok)) {
    base.rawReply = outcome.rawReply;
  }

  return base;
}

function serializeEntry(entry: QueryEntry, showRaw: boolean): Record<string, unknown> {
  if (entry.kind === 'outcome') {
    return serializeOutcome(entry.outcome, showRaw);
  }

  return {
    query: entry.request.query,
    model: entry.request.model,
    taskKind: entry.request.taskKind,
    error: { code: entry.error.code, message: entry.error.message },
  };
}

function renderOutcome(outcome: SearchOutcome, showRaw: boolean): string[] {
  const { result } = outcome;
  const lines: string[] = [];

  if (result.kind === 'images') {
    lines.push(...renderImageUrls(result.urls));
  } else if (result.extraction.ok) {
    lines.push(...renderPropertyRecord(result.extraction.record, result.extraction.warnings));
  } else {
    lines.push(...renderFailure(result.extraction.failure));
  }

  if (showRaw && !(result.kind === 'property' && !result.extraction.ok)) {
    lines.push('--- raw reply ---', outcome.rawReply);
  }

  lines.push(renderCost(outcome.cost, outcome.usageApproximated));
  return lines;
}

function renderEntry(entry: QueryEntry, showRaw: boolean, withHeading: boolean): string[] {
  const query = entry.kind === 'outcome' ? entry.outcome.request.query : entry.request.query;
  const lines = entry.kind === 'outcome'
    ? renderOutcome(entry.outcome, showRaw)
    : [`Request failed [${entry.error.code}]: ${entry.error.message}`];
  return withHeading ? [`== ${query}`, ...lines] : lines;
}

function failureOf(entry: QueryEntry): ExtractionFailure | undefined {
  if (entry.kind !== 'outcome') {
    return undefined;
  }
  const { result } = entry.outcome;
  if (result.kind === 'property' && !result.extraction.ok) {
    return result.extraction.failure;
  }
  return undefined;
}

function summarizeUsage(entries: QueryEntry[], tally: SessionTally): Partial<ExecutionTelemetry> {
  return {
    replyBytes: entries.reduce(
      (total, entry) => total + (entry.kind === 'outcome' ? Buffer.byteLength(entry.outcome.rawReply, 'utf-8') : 0),
      0,
    ),
    inputTokens: tally.entries.reduce((total, cost) => total + cost.inputTokens, 0),
    outputTokens: tally.entries.reduce((total, cost) => total + cost.outputTokens, 0),
    costUsd: tally.totalUsd,
  };
}

async function executeSearchCommand(
  variant: SearchVariant,
  context: CliCommandContext,
  parsed: SearchCommandOptions,
  deps: SearchCommandDependencies,
): Promise<CommandResult> {
  if (parsed.help) {
    return {
      exitCode: 0,
      output: { kind: 'text', text: `${buildHelpMessage(variant)}\n`, scope: 'info' },
    };
  }

  const queries = await resolveQueries(parsed, deps);
  const profile = await deps.profiles.getProfile(parsed.profile);
  const baseUrl = normalize(parsed.baseUrl) ?? normalize(profile.endpoint);
  const model = normalize(parsed.model) ?? normalize(profile.model);
  const apiKey = normalize(parsed.apiKey) ?? normalize(profile.apiKey);
  const timeoutMs = parsed.timeoutMs ?? profile.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  if (!baseUrl) {
    throw new CliUsageError(`profile '${profile.name}' has no endpoint; pass --base-url or run 'estate-lens config set'`);
  }

  if (!model) {
    throw new CliUsageError(`profile '${profile.name}' has no model; pass --model`);
  }

  const requests = queries.map((query) => createSearchRequest({ query, model, taskKind: variant.taskKind }));
  const sampling = { temperature: parsed.temperature, maxTokens: parsed.maxTokens };
  const queryBytes = queries.reduce((total, query) => total + Buffer.byteLength(query, 'utf-8'), 0);
  const telemetryBase = { profile: profile.name, model, queryBytes };

  if (context.globals.dryRun) {
    return {
      exitCode: 0,
      output: {
        kind: 'dry-run',
        summary: `Built ${requests.length} ${variant.taskKind} request(s) without calling the endpoint`,
        details: {
          profile: profile.name,
          baseUrl,
          timeoutMs,
          apiKey: apiKey ? 'set' : `missing (set ${profile.apiKeyEnv} or pass --api-key)`,
          requests: requests.map((request) => buildChatRequest(request, sampling)),
        },
      },
      telemetry: telemetryBase,
    };
  }

  if (!apiKey) {
    throw new CliUsageError(`No API key: pass --api-key or set the ${profile.apiKeyEnv} environment variable`);
  }

  const client = deps.llmFactory({ baseUrl, apiKey, model, timeoutMs });
  const executor = deps.searchExecutor ?? searchProperty;
  const entries: QueryEntry[] = [];
  let tally: SessionTally = createSessionTally();

  // One request at a time; the tally is threaded through explicitly. With several
  // queries a transport error is kept as that query's entry and the run goes on.
  for (const request of requests) {
    try {
      const outcome = await executor(client, request, { ...sampling, maxImages: parsed.maxImages });
      entries.push({ kind: 'outcome', outcome });
      tally = recordCost(tally, outcome.cost);
    } catch (error) {
      if (requests.length === 1 || !isChatCoreError(error)) {
        throw new SearchRunError(error, {
          telemetry: { ...telemetryBase, ...summarizeUsage(entries, tally) },
          logFile: profile.logFile,
        });
      }
      entries.push({ kind: 'error', request, error });
    }
  }

  const telemetry = { ...telemetryBase, ...summarizeUsage(entries, tally) };

  const failures = entries.map(failureOf).filter((failure): failure is ExtractionFailure => failure !== undefined);
  if (entries.length === 1 && failures.length === 1) {
    throw new ReplyInterpretationError(failures[0], { telemetry, logFile: profile.logFile });
  }

  const failed = failures.length + entries.filter((entry) => entry.kind === 'error').length;
  const exitCode = failed > 0 ? 1 : 0;
  const runTelemetry = failed > 0 ? { ...telemetry, errorCode: 'E_PARTIAL' } : telemetry;

  if (parsed.format === 'json') {
    return {
      exitCode,
      output: {
        kind: 'json',
        data: {
          profile: profile.name,
          results: entries.map((entry) => serializeEntry(entry, parsed.showRaw)),
          session: { calls: tally.calls, totalUsd: tally.totalUsd },
        },
      },
      logFile: profile.logFile,
      telemetry: runTelemetry,
    };
  }

  const withHeading = entries.length > 1;
  const sections = entries.map((entry) => renderEntry(entry, parsed.showRaw, withHeading).join('\n'));
  if (withHeading) {
    sections.push(renderSessionTotal(tally));
  }

  return {
    exitCode,
    output: { kind: 'text', text: `${sections.join('\n\n')}\n` },
    logFile: profile.logFile,
    telemetry: runTelemetry,
  };
}

function createHandler(variant: SearchVariant, deps: SearchCommandDependencies): CommandHandler {
  return async (context) => {
    const parsed = parseSearchCommandArgs(context.argv);
    return executeSearchCommand(variant, context, parsed, deps);
  };
}

export function createSearchCommandHandler(deps: SearchCommandDependencies): CommandHandler {
  return createHandler(SEARCH_VARIANT, deps);
}

export function createImagesCommandHandler(deps: SearchCommandDependencies): CommandHandler {
  return createHandler(IMAGES_VARIANT, deps);
}

export function createSearchCommandDescriptor(deps: SearchCommandDependencies): CommandDescriptor {
  return {
    name: SEARCH_VARIANT.name,
    summary: SEARCH_VARIANT.summary,
    usage: 'search [options] <query>',
    handler: createSearchCommandHandler(deps),
  };
}

export function createImagesCommandDescriptor(deps: SearchCommandDependencies): CommandDescriptor {
  return {
    name: IMAGES_VARIANT.name,
    summary: IMAGES_VARIANT.summary,
    usage: 'images [options] <query>',
    handler: createImagesCommandHandler(deps),
  };
}
