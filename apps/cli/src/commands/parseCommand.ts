import { extractImageUrls, extractPropertyRecord } from '@estate-lens/chat-core';

import { CliUsageError, ReplyInterpretationError } from '../errors.js';
import type { InputResolver, TextSource } from '../inputResolver.js';
import type { CommandDescriptor, CommandHandler, CommandResult } from '../types.js';
import { parseFormat, parseInteger, requireValue } from './argUtils.js';
import { renderImageUrls, renderPropertyRecord } from './searchRendering.js';

type ParseMode = 'property' | 'images';

interface ParseCommandOptions {
  mode: ParseMode;
  text?: string;
  file?: string;
  maxImages: number;
  format: 'text' | 'json';
  help?: boolean;
}

export interface ParseCommandDependencies {
  inputResolver: Pick<InputResolver, 'resolve'>;
}

const HELP_MESSAGE = `estate-lens parse - Interpret a saved model reply without calling the endpoint

Usage:
  estate-lens parse [options] --file ./reply.txt
  estate-lens parse [options] --text '{"builder": "..."}'
  cat reply.txt | estate-lens parse [options]

Options:
  --mode <property|images>  How to read the reply (default: property)
  --file <path>             Read the reply from a file
  --text <value>            Use the given reply text
  --max <n>                 Keep at most n image URLs in images mode (default: 0 = all)
  --format <text|json>      Output format (default: text)
  --help                    Show this help`;

function parseMode(raw: string): ParseMode {
  if (raw !== 'property' && raw !== 'images') {
    throw new CliUsageError(`--mode expects 'property' or 'images', got '${raw}'`);
  }
  return raw;
}

function parseParseCommandArgs(args: string[]): ParseCommandOptions {
  const parsed: ParseCommandOptions = { mode: 'property', maxImages: 0, format: 'text' };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];

    switch (arg) {
      case '--mode':
        parsed.mode = parseMode(requireValue(args, ++i, arg));
        break;
      case '--text':
        parsed.text = requireValue(args, ++i, arg);
        break;
      case '--file':
        parsed.file = requireValue(args, ++i, arg);
        break;
      case '--max':
        parsed.maxImages = parseInteger(arg, requireValue(args, ++i, arg), 0);
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

  if (parsed.text !== undefined && parsed.file !== undefined) {
    throw new CliUsageError('--text and --file cannot be combined');
  }

  return parsed;
}

function toSource(parsed: ParseCommandOptions): TextSource {
  if (parsed.text !== undefined) {
    return { kind: 'inline', value: parsed.text };
  }
  if (parsed.file !== undefined) {
    return { kind: 'file', path: parsed.file };
  }
  return { kind: 'stdin' };
}

async function executeParseCommand(
  parsed: ParseCommandOptions,
  deps: ParseCommandDependencies,
): Promise<CommandResult> {
  if (parsed.help) {
    return { exitCode: 0, output: { kind: 'text', text: `${HELP_MESSAGE}\n`, scope: 'info' } };
  }

  const { text, metadata } = await deps.inputResolver.resolve(toSource(parsed));
  const telemetry = { replyBytes: metadata.bytes };

  if (parsed.mode === 'images') {
    const urls = extractImageUrls(text, parsed.maxImages);
    return {
      exitCode: 0,
      output:
        parsed.format === 'json'
          ? { kind: 'json', data: { images: urls } }
          : { kind: 'text', text: `${renderImageUrls(urls).join('\n')}\n` },
      telemetry,
    };
  }

  const extraction = extractPropertyRecord(text);
  if (!extraction.ok) {
    throw new ReplyInterpretationError(extraction.failure);
  }

  if (parsed.format === 'json') {
    return {
      exitCode: 0,
      output: {
        kind: 'json',
        data: {
          record: extraction.record,
          warnings: extraction.warnings,
          ...(extraction.recoveredBy ? { recoveredBy: extraction.recoveredBy } : {}),
        },
      },
      telemetry,
    };
  }

  const lines = renderPropertyRecord(extraction.record, extraction.warnings);
  return { exitCode: 0, output: { kind: 'text', text: `${lines.join('\n')}\n` }, telemetry };
}

export function createParseCommandHandler(deps: ParseCommandDependencies): CommandHandler {
  return async (context) => executeParseCommand(parseParseCommandArgs(context.argv), deps);
}

export function createParseCommandDescriptor(deps: ParseCommandDependencies): CommandDescriptor {
  return {
    name: 'parse',
    summary: 'Interpret a saved model reply offline',
    usage: 'parse [--mode property|images] [--file <path>|--text <value>]',
    handler: createParseCommandHandler(deps),
  };
}
