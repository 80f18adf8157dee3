import { Command, CommanderError, Option } from 'commander';
import { z } from 'zod';
import { DEFAULT_SECTION } from '../config/types.js';
import { QizxClient } from '../core/client.js';
import type { QueryItem } from '../core/types.js';
import { validator } from '../utils/validator.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';

/** Client surface the commands use. */
export type CliClient = Pick<QizxClient, 'eval' | 'get' | 'info' | 'listLibraries' | 'dispose'>;

/** Options the global flags turn into. */
export interface ClientFactoryOptions {
  /** Config file from `--config` */
  configPath?: string;
  /** Timeout from `--timeout`, `false` for `--timeout 0` */
  timeout?: number | false;
}

/** Creates the client for a target; replaced in tests. */
export type ClientFactory = (target: string, options: ClientFactoryOptions) => SafeWrapAsync<Error, CliClient>;

/** Dependencies of {@link runCli}. */
export interface CliDeps {
  createClient?: ClientFactory;
  stdout?: (chunk: string | Uint8Array) => void;
  stderr?: (text: string) => void;
}

const defaultCreateClient: ClientFactory = (target, options) => QizxClient.create(target, options);

const globalSchema = z.object({
  url: z.string().min(1).optional(),
  config: z.string().min(1).optional(),
  timeout: z.coerce.number().int().nonnegative().optional(),
});

const evalSchema = z.object({
  library: z.string().min(1).optional(),
  format: z.enum(['items', 'xml', 'html', 'xhtml']).optional(),
  mode: z.literal('profile').optional(),
  maxtime: z.coerce.number().int().nonnegative().optional(),
  counting: z.enum(['exact', 'estimated', 'none']).optional(),
  count: z.coerce.number().int().min(1).optional(),
  first: z.coerce.number().int().min(1).optional(),
  var: z.array(z.string().regex(/^[^=]+=/, 'expected name=value')).default([]),
});

const getSchema = z.object({
  library: z.string().min(1).optional(),
});

/** Renders one decoded item as a single output line. */
export function formatItem(item: QueryItem): string {
  if (item instanceof Date) {
    return item.toISOString();
  }

  if (typeof item === 'object') {
    return JSON.stringify(item);
  }

  return String(item);
}

function parseVariables(pairs: string[]): Record<string, string> {
  const variables: Record<string, string> = {};
  for (const pair of pairs) {
    const separator = pair.indexOf('=');
    variables[pair.slice(0, separator)] = pair.slice(separator + 1);
  }

  return variables;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/** Exit code holder shared by the commands of one run. */
interface RunState {
  exitCode: number;
}

/**
 * Builds the `qizx` command tree.
 * Commands write results to `stdout`, and failures as `error: <message>` to `stderr`.
 */
export function createProgram(state: RunState, deps: CliDeps = {}): Command {
  const createClient = deps.createClient ?? defaultCreateClient;
  const stdout = deps.stdout ?? ((chunk: string | Uint8Array) => process.stdout.write(chunk));
  const stderr = deps.stderr ?? ((text: string) => process.stderr.write(text));

  const fail = (error: Error) => {
    stderr(`error: ${error.message}\n`);
    state.exitCode = 1;
  };

  const print = (text: string) => stdout(text.endsWith('\n') ? text : `${text}\n`);

  // raw payloads are written byte for byte, in the server's encoding
  const printBytes = (bytes: Uint8Array) => {
    stdout(bytes);
    if (bytes[bytes.length - 1] !== 0x0a) {
      stdout('\n');
    }
  };

  const program = new Command();

  program
    .name('qizx')
    .description('Query a Qizx XML database over its REST API')
    .option('-u, --url <target>', `config section or http(s) URL (default: "${DEFAULT_SECTION}")`)
    .option('-c, --config <path>', 'config file tried before ~/.qizx and ./.qizx')
    .option('-t, --timeout <ms>', 'request timeout in milliseconds, 0 disables it')
    .exitOverride()
    .configureOutput({ writeOut: stdout, writeErr: stderr });

  /** Resolves the client from the global flags, runs `command`, and disposes the client. */
  const withClient = async (command: (client: CliClient) => Promise<Error | null>) => {
    const [errOptions, globals] = await validator(program.opts(), globalSchema, 'error invalid options');
    if (errOptions) {
      return fail(errOptions);
    }

    const timeout = globals.timeout === 0 ? false : globals.timeout;
    const [errClient, client] = await createClient(globals.url ?? DEFAULT_SECTION, {
      configPath: globals.config,
      timeout,
    });
    if (errClient) {
      return fail(errClient);
    }

    const errCommand = await command(client);
    const [errDispose] = await client.dispose();
    const err = errCommand ?? errDispose;
    if (err) {
      fail(err);
    }
  };

  program
    .command('eval')
    .description('evaluate a query; items are printed one per line, other formats as returned')
    .argument('<query>', 'query expression')
    .option('-l, --library <name>', 'library to query')
    .addOption(new Option('-f, --format <format>', 'result format').choices(['items', 'xml', 'html', 'xhtml']))
    .addOption(new Option('--mode <mode>', 'evaluation mode, items format only').choices(['profile']))
    .option('--maxtime <ms>', 'server-side time limit in milliseconds')
    .addOption(
      new Option('--counting <mode>', 'item counting, items format only').choices(['exact', 'estimated', 'none']),
    )
    .option('--count <n>', 'maximum number of items, items format only')
    .option('--first <n>', 'rank of the first item, items format only')
    .option('--var <name=value>', 'bind an external variable, repeatable', collect, [])
    .action(async (query: string, rawOptions: unknown) => {
      const [errOptions, options] = await validator(rawOptions, evalSchema, 'error invalid eval options');
      if (errOptions) {
        return fail(errOptions);
      }

      const { var: pairs, ...request } = options;
      const raw = request.format !== 'items' || request.mode === 'profile';

      await withClient(async (client) => {
        const [err, result] = await client.eval(query, {
          ...request,
          bindVariables: parseVariables(pairs),
          raw,
        });
        if (err) {
          return err;
        }

        switch (result.kind) {
          case 'raw':
            printBytes(result.payload);
            break;
          case 'items':
            for (const item of result.items) {
              print(formatItem(item));
            }
            break;
          case 'document':
            print(JSON.stringify(result.document));
            break;
        }

        return null;
      });
    });

  program
    .command('get')
    .description('print the content of a document')
    .argument('<path>', 'document path')
    .option('-l, --library <name>', 'library holding the document')
    .action(async (path: string, rawOptions: unknown) => {
      const [errOptions, options] = await validator(rawOptions, getSchema, 'error invalid get options');
      if (errOptions) {
        return fail(errOptions);
      }

      await withClient(async (client) => {
        const [err, text] = await client.get(path, { library: options.library });
        if (err) {
          return err;
        }

        print(text);
        return null;
      });
    });

  program
    .command('info')
    .description('print the server information properties')
    .action(async () => {
      await withClient(async (client) => {
        const [err, info] = await client.info();
        if (err) {
          return err;
        }

        for (const [name, value] of Object.entries(info)) {
          print(`${name}: ${formatItem(value)}`);
        }

        return null;
      });
    });

  program
    .command('listlib')
    .description('list the libraries of the database')
    .action(async () => {
      await withClient(async (client) => {
        const [err, libraries] = await client.listLibraries();
        if (err) {
          return err;
        }

        for (const library of libraries) {
          print(library);
        }

        return null;
      });
    });

  return program;
}

/**
 * Runs the CLI on `argv` (without the node and script entries) and resolves to the exit code.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const state: RunState = { exitCode: 0 };
  const program = createProgram(state, deps);

  const [err] = await safeWrapAsync(() => program.parseAsync(argv, { from: 'user' }));
  // commander already printed its own message
  if (err instanceof CommanderError) {
    return err.exitCode;
  }

  if (err) {
    const stderr = deps.stderr ?? ((text: string) => process.stderr.write(text));
    stderr(`error: ${err.message}\n`);
    return 1;
  }

  return state.exitCode;
}
