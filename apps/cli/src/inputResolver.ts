import { readFile } from 'node:fs/promises';
import process from 'node:process';
import { Readable } from 'node:stream';

export type TextSource =
  | { kind: 'inline'; value: string }
  | { kind: 'file'; path: string }
  | { kind: 'stdin' };

export interface InputMetadata {
  source: TextSource['kind'];
  filePath?: string;
  bytes: number;
}

export interface ResolvedInput {
  text: string;
  metadata: InputMetadata;
}

type StdinLike = Readable & { isTTY?: boolean };

export interface InputResolverDependencies {
  stdinFactory?: () => StdinLike;
  readFileImpl?: (path: string, encoding: BufferEncoding) => Promise<string>;
}

export class InputResolveError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InputResolveError';
  }
}

function describeInput(text: string, metadata: Omit<InputMetadata, 'bytes'>): ResolvedInput {
  return {
    text,
    metadata: {
      ...metadata,
      bytes: Buffer.byteLength(text, 'utf-8'),
    },
  };
}

export class InputResolver {
  private readonly stdinFactory: () => StdinLike;

  private readonly readFileImpl: (path: string, encoding: BufferEncoding) => Promise<string>;

  constructor(deps: InputResolverDependencies = {}) {
    this.stdinFactory = deps.stdinFactory ?? (() => process.stdin);
    this.readFileImpl = deps.readFileImpl ?? ((path, encoding) => readFile(path, { encoding }));
  }

  async resolve(source: TextSource): Promise<ResolvedInput> {
    switch (source.kind) {
      case 'inline':
        return describeInput(source.value.trim(), { source: 'inline' });
      case 'file':
        return this.resolveFile(source.path);
      case 'stdin':
        return this.resolveStdin();
      default: {
        const unsupported: never = source;
        throw new InputResolveError(`Unsupported text source: ${JSON.stringify(unsupported)}`);
      }
    }
  }

  private async resolveFile(path: string): Promise<ResolvedInput> {
    if (!path) {
      throw new InputResolveError('--file requires a path');
    }

    let text: string;
    try {
      text = await this.readFileImpl(path, 'utf-8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new InputResolveError(`could not read ${path}: ${reason}`);
    }

    return describeInput(text.trim(), { source: 'file', filePath: path });
  }

  private async resolveStdin(): Promise<ResolvedInput> {
    const stream = this.stdinFactory();

    if (stream.isTTY) {
      throw new InputResolveError('no input given; pass it as an argument, with --file, or pipe it on stdin');
    }

    const chunks: Buffer[] = [];

    for await (const chunk of stream) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }

    if (chunks.length === 0) {
      throw new InputResolveError('stdin provided no data');
    }

    return describeInput(Buffer.concat(chunks).toString('utf-8').trim(), { source: 'stdin' });
  }
}
