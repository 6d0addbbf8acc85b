/**
 * Command line interface
 *
 * Reads a raw source payload from a file, normalizes and pages it through
 * the request pipeline, and prints it in the requested format.
 */

import type { GroupSelector, SourceId } from '../schemas/index.js';
import { GroupSelectorSchema, SourceIdSchema } from '../schemas/index.js';
import type { OutputFormat } from '../schemas/config.js';
import { OutputFormatSchema } from '../schemas/config.js';
import type { FetchCallback } from '../normalizers/types.js';
import { createAdapterRegistry } from '../providers/index.js';
import { actorToHtml, actorToMf2, renderEnvelope } from '../codecs/index.js';
import { getActivities, getActor } from './activities.js';
import { loadConfig } from './config.js';
import { BadRequestError, toErrorResponse } from './errors.js';

export interface CliArgs {
  source: SourceId;
  input: string;
  format?: OutputFormat;
  group?: GroupSelector;
  query?: string;
  userId?: string;
  startIndex?: number;
  count?: number;
  /** Print the normalized profile instead of activities */
  actor?: boolean;
  config?: string;
  output?: string;
  help?: boolean;
}

function parseInteger(flag: string, value: string | undefined): number {
  const parsed = Number(value);
  if (value === undefined || !Number.isInteger(parsed) || parsed < 0) {
    throw new BadRequestError(`${flag} must be a non-negative integer, got ${value ?? 'nothing'}`);
  }
  return parsed;
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith('--')) {
    throw new BadRequestError(`${flag} needs a value`);
  }
  return value;
}

/**
 * @throws BadRequestError for unknown flags, bad values or missing required flags
 */
export function parseArgs(args: string[]): CliArgs {
  const result: Partial<CliArgs> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const nextArg = args[i + 1];

    switch (arg) {
      case '--source': {
        const source = SourceIdSchema.safeParse(nextArg);
        if (!source.success) {
          throw new BadRequestError(`Unknown source: ${nextArg ?? 'nothing'}`);
        }
        result.source = source.data;
        i++;
        break;
      }
      case '--input':
        result.input = requireValue(arg, nextArg);
        i++;
        break;
      case '--format': {
        const format = OutputFormatSchema.safeParse(nextArg);
        if (!format.success) {
          throw new BadRequestError(`Unknown format: ${nextArg ?? 'nothing'}`);
        }
        result.format = format.data;
        i++;
        break;
      }
      case '--group': {
        const group = GroupSelectorSchema.safeParse(nextArg);
        if (!group.success) {
          throw new BadRequestError(`Unknown group: ${nextArg ?? 'nothing'}`);
        }
        result.group = group.data;
        i++;
        break;
      }
      case '--q':
        result.query = requireValue(arg, nextArg);
        i++;
        break;
      case '--user':
        result.userId = requireValue(arg, nextArg);
        i++;
        break;
      case '--startIndex':
        result.startIndex = parseInteger(arg, nextArg);
        i++;
        break;
      case '--count':
        result.count = parseInteger(arg, nextArg);
        i++;
        break;
      case '--actor':
        result.actor = true;
        break;
      case '--config':
        result.config = requireValue(arg, nextArg);
        i++;
        break;
      case '--output':
        result.output = requireValue(arg, nextArg);
        i++;
        break;
      case '--help':
        result.help = true;
        break;
      default:
        throw new BadRequestError(`Unknown option: ${arg}`);
    }
  }

  if (result.help) {
    return { source: result.source ?? 'twitter', input: result.input ?? '', help: true };
  }
  if (!result.source) {
    throw new BadRequestError('--source is required');
  }
  if (!result.input) {
    throw new BadRequestError('--input is required');
  }

  return { ...result, source: result.source, input: result.input };
}

export function printHelp(): void {
  console.log(`
activity-codec

Usage:
  activity-codec --source <id> --input <file> [options]

Options:
  --source <id>        Source of the payload: twitter, facebook, instagram, mastodon, bluesky
  --input <path>       Raw payload file (JSON as returned by the source API)
  --format <name>      Output format: json, atom, xml, mf2-html, mf2-json, jsonfeed
                       (default: from config, else json)
  --group <selector>   @all, @friends, @self or @search (default: @all)
  --q <text>           Search query, only with --group @search
  --user <id>          User the payload belongs to
  --startIndex <n>     First item to return (default: 0)
  --count <n>          Number of items to return (default: config pageSize, else all)
  --actor              Treat the payload as a profile and print the actor
  --config <path>      Path to config file (default: ./config.json)
  --output <path>      Output file path (default: stdout)
  --help               Show this help message

Examples:
  activity-codec --source twitter --input timeline.json --format atom
  activity-codec --source mastodon --input statuses.json --startIndex 20 --count 20
`);
}

/**
 * Run the CLI
 * @returns the process exit code
 */
export async function runCli(argv: string[]): Promise<number> {
  try {
    const args = parseArgs(argv);
    if (args.help) {
      printHelp();
      return 0;
    }

    const configPath = args.config ?? './config.json';
    const config = await loadConfig(configPath);
    const adapter = createAdapterRegistry(config).get(args.source);
    if (!adapter) {
      throw new BadRequestError(`No adapter for ${args.source}`);
    }

    const fs = await import('fs/promises');
    let raw: unknown;
    try {
      raw = JSON.parse(await fs.readFile(args.input, 'utf-8'));
    } catch (error) {
      throw new BadRequestError(
        `Failed to read input ${args.input}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    console.error(`Source: ${args.source}`);
    console.error(`Input: ${args.input}`);
    console.error(`Config: ${configPath}`);

    // The payload file stands in for the source's HTTP response
    const fetch: FetchCallback = () => ({ status: 200, body: raw });
    const format = args.format ?? config.defaultFormat;
    let body: string;

    if (args.actor) {
      const actor = getActor(adapter, fetch, args.userId);
      body =
        format === 'mf2-html'
          ? actorToHtml(actor)
          : JSON.stringify(format === 'mf2-json' ? actorToMf2(actor) : actor, null, 2);
    } else {
      const { envelope, warnings } = getActivities(
        adapter,
        fetch,
        {
          userId: args.userId,
          group: args.group,
          query: args.query,
          startIndex: args.startIndex,
          count: args.count,
        },
        { defaultCount: config.pageSize }
      );
      console.error(
        `Normalized ${envelope.itemsPerPage} of ${envelope.totalResults} activities` +
          (warnings.length > 0 ? `, skipped ${warnings.length}` : '')
      );
      body = renderEnvelope(envelope, format, {
        title: config.atom.title,
        hostUrl: config.atom.hostUrl,
      }).body;
    }

    if (args.output) {
      await fs.writeFile(args.output, body);
      console.error(`Output written to: ${args.output}`);
    } else {
      console.log(body);
    }
    return 0;
  } catch (error) {
    const response = toErrorResponse(error);
    console.error(JSON.stringify(response.body));
    return 1;
  }
}
