/**
 * Command-line argument parsing for the relay CLI.
 * @packageDocumentation
 */

export interface CliOptions {
  help: boolean;
  version: boolean;
  verbose: boolean;
  progress: boolean;
  port?: number;
  host?: string;
  configPath?: string;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export function parseArgs(args: readonly string[]): CliOptions {
  const opts: CliOptions = { help: false, version: false, verbose: false, progress: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const value = args[i + 1];

    if (arg === '-h' || arg === '--help') {
      opts.help = true;
    } else if (arg === '--version') {
      opts.version = true;
    } else if (arg === '-v' || arg === '--verbose') {
      opts.verbose = true;
    } else if (arg === '--progress') {
      opts.progress = true;
    } else if (arg === '--port') {
      const port = value === undefined ? NaN : Number(value);
      if (!Number.isInteger(port) || port < 0 || port > 65535) {
        throw new CliUsageError('Invalid port number');
      }
      opts.port = port;
      i++;
    } else if (arg === '--host') {
      if (!value) throw new CliUsageError('--host needs a value');
      opts.host = value;
      i++;
    } else if (arg === '--config') {
      if (!value) throw new CliUsageError('--config needs a path');
      opts.configPath = value;
      i++;
    } else {
      throw new CliUsageError(`Unknown option: ${arg}`);
    }
  }

  return opts;
}

export const HELP_TEXT = `
Usage: llm-dialect-relay [options]

Options:
  --port <number>    Port to listen on (default: 11731)
  --host <string>    Host to bind to (default: 0.0.0.0)
  --config <path>    JSON config file
  --progress         Live progress line for streamed chat completions
  -v, --verbose      Debug logging
  -h, --help         Show this help message
  --version          Show version

Environment Variables:
  UPSTREAM_BASE_URL    Gateway base for chat completions and pass-through
  ANTHROPIC_BASE_URL   Gateway base for messages
  UPSTREAM_PROXY_URL   Forward proxy for upstream connections
  UPSTREAM_API_KEY     Credential stamped on every upstream request
  ANTHROPIC_MODEL_MAP  JSON object mapping caller models to upstream models
  ENABLE_WEB_SEARCH    Append the web search tool to messages requests
  WEB_SEARCH_TOOL      JSON tool definition to append
  EXCHANGE_TIMEOUT_MS  Ceiling for one upstream exchange (0 = none)
  MAX_BODY_BYTES       Largest accepted request body
  RELAY_PORT, RELAY_HOST, RELAY_LOG_LEVEL
`;
