import { estimateCost, formatUsd, listKnownModels, lookupRate } from '@estate-lens/chat-core';

import { CliUsageError } from '../errors.js';
import type { CommandDescriptor, CommandHandler, CommandResult } from '../types.js';
import { parseFormat, parseInteger, requireValue } from './argUtils.js';
import { renderCost } from './searchRendering.js';

interface CostCommandOptions {
  model?: string;
  inputTokens?: number;
  outputTokens?: number;
  list: boolean;
  format: 'text' | 'json';
  help?: boolean;
}

const HELP_MESSAGE = `estate-lens cost - Estimate the USD cost of a call offline

Usage:
  estate-lens cost --model sonar --input 1200 --output 800
  estate-lens cost --list

Options:
  --model <name>        Model identifier
  --input <n>           Prompt tokens
  --output <n>          Completion tokens
  --list                Show the per-1K-token rates of every known model
  --format <text|json>  Output format (default: text)
  --help                Show this help`;

function parseCostCommandArgs(args: string[]): CostCommandOptions {
  const parsed: CostCommandOptions = { list: false, format: 'text' };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];

    switch (arg) {
      case '--model':
        parsed.model = requireValue(args, ++i, arg);
        break;
      case '--input':
        parsed.inputTokens = parseInteger(arg, requireValue(args, ++i, arg), 0);
        break;
      case '--output':
        parsed.outputTokens = parseInteger(arg, requireValue(args, ++i, arg), 0);
        break;
      case '--list':
        parsed.list = true;
        break;
      case '--format':
        parsed.format = parseFormat(requireValue(args, ++i, arg));
        break;
      case '--help':
      case '-h':
        parsed.help = true;
        break;
      default:
        throw new CliUsageError(`Unknown option: ${arg}`);
    }
  }

  return parsed;
}

function listRates(format: 'text' | 'json'): CommandResult {
  const rows = listKnownModels().map((model) => ({ model, ...lookupRate(model).rate }));

  if (format === 'json') {
    return { exitCode: 0, output: { kind: 'json', data: { models: rows } } };
  }

  const width = Math.max(...rows.map((row) => row.model.length)) + 2;
  const lines = ['USD per 1K tokens (input / output):'];
  for (const row of rows) {
    lines.push(`  ${row.model.padEnd(width, ' ')}${formatUsd(row.input)} / ${formatUsd(row.output)}`);
  }
  return { exitCode: 0, output: { kind: 'text', text: `${lines.join('\n')}\n` } };
}

function executeCostCommand(parsed: CostCommandOptions): CommandResult {
  if (parsed.help) {
    return { exitCode: 0, output: { kind: 'text', text: `${HELP_MESSAGE}\n`, scope: 'info' } };
  }

  if (parsed.list) {
    return listRates(parsed.format);
  }

  const model = parsed.model?.trim();
  if (!model || parsed.inputTokens === undefined || parsed.outputTokens === undefined) {
    throw new CliUsageError('cost requires --model, --input and --output (or --list)');
  }

  const estimate = estimateCost(model, parsed.inputTokens, parsed.outputTokens);
  const telemetry = {
    model,
    inputTokens: estimate.inputTokens,
    outputTokens: estimate.outputTokens,
    costUsd: estimate.amountUsd,
  };

  if (parsed.format === 'json') {
    return { exitCode: 0, output: { kind: 'json', data: estimate }, telemetry };
  }

  return { exitCode: 0, output: { kind: 'text', text: `${renderCost(estimate, false)}\n` }, telemetry };
}

export function createCostCommandHandler(): CommandHandler {
  return async (context) => executeCostCommand(parseCostCommandArgs(context.argv));
}

export function createCostCommandDescriptor(): CommandDescriptor {
  return {
    name: 'cost',
    summary: 'Estimate the cost of a call from token counts',
    usage: 'cost --model <name> --input <n> --output <n> | cost --list',
    handler: createCostCommandHandler(),
  };
}
