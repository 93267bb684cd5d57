#!/usr/bin/env node
import process from 'node:process';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import logger, { getAvailableLogLevels, setLogLevel } from './logger.js';
import { serve, type ExporterOptions } from './app.js';

type CliIo = {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
};

type ServeArgs = {
  help: boolean;
  port?: number;
  observabilityPort?: number;
  configFile?: string;
  logLevel?: string;
};

export type CliDependencies = {
  serve: (options: ExporterOptions) => Promise<void>;
};

const DEFAULT_IO: CliIo = {
  stdout: process.stdout,
  stderr: process.stderr
};

const DEFAULT_DEPENDENCIES: CliDependencies = { serve };

const USAGE = [
  'SignalFlow Prometheus exporter',
  '',
  'Usage:',
  '  sfxpe [serve] [options]  Stream the configured flows and serve them for Prometheus',
  '  sfxpe help               Show this help message',
  '',
  'Options:',
  '  -l, --port <port>                 Port of the /probe endpoint (default: 9091)',
  '  -p, --observability-port <port>   Port of the exporter\'s own /metrics endpoint (default: 9090)',
  '  -c, --config <path>               Flow configuration file (default: /config/config.yml)',
  '      --log-level <level>           Log level override',
  '  -h, --help                        Show this help message'
].join('\n');

class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export async function runCli(
  argv = process.argv.slice(2),
  io: CliIo = DEFAULT_IO,
  dependencies: CliDependencies = DEFAULT_DEPENDENCIES
): Promise<number> {
  const command = argv[0] ?? 'serve';

  switch (command) {
    case 'serve': {
      return runServeCommand(argv.slice(1), io, dependencies);
    }
    case 'help':
    case '--help':
    case '-h': {
      io.stdout.write(`${USAGE}\n`);
      return 0;
    }
    default: {
      if (command.startsWith('-')) {
        return runServeCommand(argv, io, dependencies);
      }
      io.stderr.write(`Unknown command: ${command}\n`);
      io.stderr.write(`${USAGE}\n`);
      return 1;
    }
  }
}

async function runServeCommand(
  args: string[],
  io: CliIo,
  dependencies: CliDependencies
): Promise<number> {
  let parsed: ServeArgs;
  try {
    parsed = parseServeArgs(args);
  } catch (error) {
    if (error instanceof CliUsageError) {
      io.stderr.write(`${error.message}\n`);
      io.stderr.write(`${USAGE}\n`);
      return 1;
    }
    throw error;
  }

  if (parsed.help) {
    io.stdout.write(`${USAGE}\n`);
    return 0;
  }

  if (parsed.logLevel) {
    try {
      setLogLevel(parsed.logLevel);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      io.stderr.write(`${message}\n`);
      return 1;
    }
  }

  try {
    await dependencies.serve({
      port: parsed.port,
      observabilityPort: parsed.observabilityPort,
      configFile: parsed.configFile
    });
  } catch (error) {
    logger.fatal({ err: error }, 'Exporter failed');
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`Exporter failed: ${message}\n`);
    return 1;
  }

  return 0;
}

function parseServeArgs(args: string[]): ServeArgs {
  const result: ServeArgs = { help: false };

  for (let index = 0; index < args.length; index += 1) {
    const token = args[index] ?? '';
    const [flag, inlineValue] = splitInlineValue(token);

    const takeValue = () => {
      if (inlineValue !== undefined) {
        return inlineValue;
      }
      const next = args[index + 1];
      if (next === undefined || next.startsWith('-')) {
        throw new CliUsageError(`Missing value for ${flag}`);
      }
      index += 1;
      return next;
    };

    switch (flag) {
      case '-h':
      case '--help':
        result.help = true;
        break;
      case '-l':
      case '--port':
        result.port = parsePort(flag, takeValue());
        break;
      case '-p':
      case '--observability-port':
        result.observabilityPort = parsePort(flag, takeValue());
        break;
      case '-c':
      case '--config':
        result.configFile = takeValue();
        break;
      case '--log-level': {
        const level = takeValue().trim().toLowerCase();
        const available = getAvailableLogLevels();
        if (!available.includes(level)) {
          throw new CliUsageError(`Unknown log level "${level}" (available: ${available.join(', ')})`);
        }
        result.logLevel = level;
        break;
      }
      default:
        throw new CliUsageError(
          flag.startsWith('-') ? `Unknown option: ${flag}` : `Unexpected argument: ${flag}`
        );
    }
  }

  return result;
}

function splitInlineValue(token: string): [string, string | undefined] {
  if (!token.startsWith('--')) {
    return [token, undefined];
  }
  const separator = token.indexOf('=');
  if (separator === -1) {
    return [token, undefined];
  }
  return [token.slice(0, separator), token.slice(separator + 1)];
}

function parsePort(flag: string, value: string): number {
  const port = Number(value);
  if (value.trim() === '' || !Number.isInteger(port) || port < 0 || port > 65535) {
    throw new CliUsageError(`Invalid value for ${flag}: ${value} (expected a port between 0 and 65535)`);
  }
  return port;
}

const resolvedPath = path.resolve(process.argv[1] ?? '');
const modulePath = fileURLToPath(import.meta.url);

if (resolvedPath === modulePath) {
  runCli().then(
    code => {
      process.exit(code);
    },
    error => {
      logger.fatal({ err: error }, 'Exporter CLI failed');
      process.exit(1);
    }
  );
}
