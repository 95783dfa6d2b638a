import { Command } from 'commander';
import {
  createTransport,
  parseRepositoryUrl,
  withConnection,
  type AuthenticationInfo,
  type Transport,
} from 's3-transport';

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

export interface ProgramDeps {
  transportFor?: (repositoryUrl: string) => Transport;
  io?: CliIO;
  exit?: (code: number) => void;
}

type GlobalOptions = {
  username?: string;
  password?: string;
};

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

function authFrom(options: GlobalOptions): AuthenticationInfo | undefined {
  if (options.username === undefined && options.password === undefined) return undefined;
  return { username: options.username, password: options.password };
}

/** Accepts epoch milliseconds or anything Date can parse. */
export function parseTimestamp(value: string): number {
  const trimmed = value.trim();
  const millis = /^\d+$/.test(trimmed) ? Number(trimmed) : Date.parse(trimmed);
  if (!Number.isFinite(millis)) {
    throw new Error(`Invalid timestamp: ${value}`);
  }
  return millis;
}

export function buildProgram(deps: ProgramDeps = {}): Command {
  const io = deps.io ?? consoleIO;
  const exit = deps.exit ?? ((code: number) => process.exit(code));
  const transportFor = deps.transportFor ?? ((url: string) => createTransport(url));
  const program = new Command();

  program
    .name('s3-transport')
    .description('Upload and download build artifacts in an S3 bucket')
    .version('1.0.0')
    .option('-u, --username <username>', 'access key id')
    .option('-p, --password <password>', 'secret access key');

  async function session(
    repositoryUrl: string,
    fn: (transport: Transport) => Promise<void>
  ): Promise<void> {
    try {
      const repository = parseRepositoryUrl(repositoryUrl);
      const auth = authFrom(program.opts<GlobalOptions>());
      await withConnection(transportFor(repositoryUrl), repository, auth, fn);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      io.err(`[ERROR] ${message}`);
      exit(1);
    }
  }

  program
    .command('exists')
    .description('Check whether a resource exists in the repository')
    .argument('<repository>', 'repository URL, e.g. s3://bucket/releases')
    .argument('<resource>', 'resource path relative to the repository')
    .action((repository: string, resource: string) =>
      session(repository, async (transport) => {
        io.out(String(await transport.exists(resource)));
      })
    );

  program
    .command('get')
    .description('Download a resource to a local file')
    .argument('<repository>', 'repository URL')
    .argument('<resource>', 'resource path relative to the repository')
    .argument('<destination>', 'local file to write')
    .action((repository: string, resource: string, destination: string) =>
      session(repository, async (transport) => {
        let bytes = 0;
        await transport.get(resource, destination, (chunk) => {
          bytes += chunk.length;
        });
        io.out(`Downloaded ${resource} to ${destination} (${bytes} bytes)`);
      })
    );

  program
    .command('put')
    .description('Upload a local file as a resource')
    .argument('<repository>', 'repository URL')
    .argument('<source>', 'local file to upload')
    .argument('<destination>', 'resource path relative to the repository')
    .action((repository: string, source: string, destination: string) =>
      session(repository, async (transport) => {
        let bytes = 0;
        await transport.put(source, destination, (chunk) => {
          bytes += chunk.length;
        });
        io.out(`Uploaded ${source} to ${destination} (${bytes} bytes)`);
      })
    );

  program
    .command('list')
    .description('List every key under a repository directory')
    .argument('<repository>', 'repository URL')
    .argument('[directory]', 'directory relative to the repository', '')
    .action((repository: string, directory: string) =>
      session(repository, async (transport) => {
        for (const key of await transport.list(directory)) {
          io.out(key);
        }
      })
    );

  program
    .command('is-newer')
    .description('Check whether the remote resource changed after a timestamp')
    .argument('<repository>', 'repository URL')
    .argument('<resource>', 'resource path relative to the repository')
    .argument('<timestamp>', 'epoch milliseconds or an ISO date')
    .action((repository: string, resource: string, timestamp: string) =>
      session(repository, async (transport) => {
        io.out(String(await transport.isNewer(resource, parseTimestamp(timestamp))));
      })
    );

  return program;
}
