import type { ConfigService } from '../config/configService.js';
import type { ProfileSummary, UpsertProfileInput } from '../config/types.js';
import { CliUsageError } from '../errors.js';
import type { CommandDescriptor, CommandResult } from '../types.js';
import { normalize, parseInteger, requireValue } from './argUtils.js';

export interface ConfigCommandDependencies {
  configService: Pick<
    ConfigService,
    'listProfiles' | 'setDefaultProfile' | 'ensureConfigFile' | 'upsertProfile'
  >;
}

function buildListOutput(profiles: ProfileSummary[]): string {
  if (profiles.length === 0) {
    return 'No profiles configured yet. Use `estate-lens config set` to add one.';
  }

  const nameWidth = Math.max(...profiles.map((profile) => profile.name.length)) + 2;
  const lines: string[] = [];
  lines.push('Configured profiles:');

  for (const profile of profiles) {
    const indicator = profile.isDefault ? '*' : ' ';
    const endpoint = profile.endpoint || '(endpoint not set)';
    const nameColumn = profile.name.padEnd(nameWidth, ' ');
    lines.push(
      `${indicator} ${nameColumn} ${endpoint}  model=${profile.model}  key=$${profile.apiKeyEnv}  updated=${profile.updatedAt}`,
    );
  }

  lines.push('');
  lines.push("'*' indicates the default profile.");
  return lines.join('\n');
}

async function handleList(
  deps: ConfigCommandDependencies,
): Promise<CommandResult> {
  const profiles = await deps.configService.listProfiles();
  return {
    exitCode: 0,
    output: { kind: 'text', text: `${buildListOutput(profiles)}\n` },
  };
}

async function handleUse(
  deps: ConfigCommandDependencies,
  argv: string[],
): Promise<CommandResult> {
  const target = argv[1];

  if (!target) {
    throw new CliUsageError('Profile name is required for `estate-lens config use <name>`');
  }

  await deps.configService.setDefaultProfile(target);

  return {
    exitCode: 0,
    output: { kind: 'text', text: `Default profile set to '${target}'.\n`, scope: 'info' },
  };
}

async function handleInit(
  deps: ConfigCommandDependencies,
): Promise<CommandResult> {
  const { created, path } = await deps.configService.ensureConfigFile();
  const text = created
    ? `Config file initialized at ${path}.\n`
    : `Config file already exists at ${path}.\n`;
  return {
    exitCode: 0,
    output: { kind: 'text', text, scope: 'info' },
  };
}

function parseSetArgs(args: string[]): { name: string; input: UpsertProfileInput } {
  const [name, ...rest] = args;
  if (!normalize(name) || name.startsWith('--')) {
    throw new CliUsageError('Profile name is required for `estate-lens config set <name>`');
  }

  let endpoint: string | undefined;
  let model: string | undefined;
  const input: Partial<UpsertProfileInput> = {};

  for (let i = 0; i < rest.length; i += 1) {
    const arg = rest[i];

    switch (arg) {
      case '--endpoint':
        endpoint = normalize(requireValue(rest, ++i, arg));
        break;
      case '--model':
        model = normalize(requireValue(rest, ++i, arg));
        break;
      case '--api-key-env':
        input.apiKeyEnv = normalize(requireValue(rest, ++i, arg));
        break;
      case '--timeout':
        input.timeoutMs = parseInteger(arg, requireValue(rest, ++i, arg), 1);
        break;
      case '--log-file':
        input.logFile = normalize(requireValue(rest, ++i, arg));
        break;
      default:
        throw new CliUsageError(`Unknown option for config set: ${arg}`);
    }
  }

  if (!endpoint || !model) {
    throw new CliUsageError('config set requires both --endpoint and --model');
  }

  return { name: name.trim(), input: { ...input, endpoint, model } };
}

async function handleSet(
  deps: ConfigCommandDependencies,
  argv: string[],
): Promise<CommandResult> {
  const { name, input } = parseSetArgs(argv.slice(1));
  await deps.configService.upsertProfile(name, input);

  return {
    exitCode: 0,
    output: { kind: 'text', text: `Profile '${name}' saved (${input.endpoint}, model=${input.model}).\n`, scope: 'info' },
  };
}

function buildUsage(): string {
  return `estate-lens config - Manage connection profiles

Usage:
  estate-lens config list             # Show configured profiles
  estate-lens config use <name>       # Switch default profile
  estate-lens config init             # Create default config.json if missing
  estate-lens config set <name> --endpoint <url> --model <name> [--api-key-env <VAR>] [--timeout <ms>] [--log-file <path>]

Sub-commands:
  list    Show configured profiles with metadata
  use     Set the default profile to the provided name
  init    Generate a seed config.json when it does not exist
  set     Create or replace a profile; the API key itself is read from the named environment variable
`;
}

export function createConfigCommandDescriptor(
  deps: ConfigCommandDependencies,
): CommandDescriptor {
  return {
    name: 'config',
    summary: 'Manage connection profiles',
    usage: 'config <sub-command>',
    handler: async (context) => {
      const [subcommand] = context.argv;

      if (!subcommand || subcommand === '--help' || subcommand === '-h') {
        return {
          exitCode: 0,
          output: { kind: 'text', text: `${buildUsage()}\n`, scope: 'info' },
        };
      }

      switch (subcommand) {
        case 'list':
          return handleList(deps);
        case 'use':
          return handleUse(deps, context.argv);
        case 'init':
          return handleInit(deps);
        case 'set':
          return handleSet(deps, context.argv);
        default:
          throw new CliUsageError(
            `Unknown config sub-command '${subcommand}'. Available: list, use, init, set`,
          );
      }
    },
  };
}
