import assert from 'node:assert/strict';
import test from 'node:test';

import { ReplyInterpretationError } from '../errors.js';
import { InputResolver } from '../inputResolver.js';
import type { CliCommandContext, CommandResult } from '../types.js';

import { createParseCommandHandler } from './parseCommand.js';

function createContext(argv: string[]): CliCommandContext {
  return {
    globals: { quiet: false, dryRun: false, logFile: undefined },
    argv,
    io: {
      writeStdout: () => {},
      writeStderr: () => {},
      setExitCode: () => {},
    },
  };
}

function textOf(result: CommandResult): string {
  const output = result.output;
  if (output?.kind !== 'text') {
    throw new Error(`expected text output, got ${output?.kind}`);
  }
  return output.text;
}

const handler = createParseCommandHandler({ inputResolver: new InputResolver() });

test('parse renders a saved property reply with image warnings', async () => {
  const reply =
    'Sure! {"images": ["https://cdn.example.com/a.jpg", 42, "ftp://cdn.example.com/b.jpg"], "pricing": [], "builder": "Acme", "amenities": []}';

  const result = await handler(createContext(['--text', reply]));

  assert.equal(result.exitCode, 0);
  assert.equal(
    textOf(result),
    [
      'Builder: Acme',
      'Pricing: none reported',
      'Amenities: none reported',
      'Images:',
      '  - https://cdn.example.com/a.jpg',
      'Warnings:',
      '  - image #2 skipped (not a string): 42',
      '  - image #3 skipped (does not start with http): ftp://cdn.example.com/b.jpg',
    ].join('\n') + '\n',
  );
  assert.deepEqual(result.telemetry, { replyBytes: Buffer.byteLength(reply, 'utf-8') });
});

test('parse in images mode returns capped URLs as JSON', async () => {
  const reply = 'https://cdn.example.com/a.jpg, https://cdn.example.com/b.webp?w=800 and https://cdn.example.com/c.png';

  const result = await handler(createContext(['--mode', 'images', '--max', '2', '--format', 'json', '--text', reply]));

  assert.deepEqual(result.output, {
    kind: 'json',
    data: { images: ['https://cdn.example.com/a.jpg', 'https://cdn.example.com/b.webp?w=800'] },
  });
});

test('parse reports replies without JSON as interpretation errors', async () => {
  await assert.rejects(handler(createContext(['--text', 'No data available.'])), (error: unknown) => {
    assert.ok(error instanceof ReplyInterpretationError);
    assert.equal(error.code, 'NO_JSON_FOUND');
    assert.equal(error.rawReply, 'No data available.');
    return true;
  });
});

test('parse rejects conflicting sources and unknown modes', async () => {
  await assert.rejects(
    handler(createContext(['--text', '{}', '--file', 'reply.txt'])),
    /--text and --file cannot be combined/,
  );
  await assert.rejects(handler(createContext(['--mode', 'pricing'])), /--mode expects 'property' or 'images'/);
});
