import type { ProxyConfig } from './config';

export interface ParsedArgs {
  help: boolean;
  ndjson: boolean;
  logLevel: 'debug' | 'info';
  config?: string;
  listen?: string;
  upstream?: string;
}

export function parseArgs (argv: string[]): ParsedArgs {
  const args: ParsedArgs = {
    help: false,
    ndjson: false,
    logLevel: 'info'
  };

  let i = 2; // Skip node and script path
  while (i < argv.length) {
    const arg = argv[i];

    if (arg === '--help' || arg === '-h') {
      args.help = true;
    } else if (arg === '--ndjson') {
      args.ndjson = true;
    } else if (arg === '--log-level' && i + 1 < argv.length) {
      const level = argv[++i];
      if (level === 'debug' || level === 'info') {
        args.logLevel = level;
      }
    } else if (arg === '--config' && i + 1 < argv.length) {
      args.config = argv[++i];
    } else if (arg === '--listen' && i + 1 < argv.length) {
      args.listen = argv[++i];
    } else if (arg === '--upstream' && i + 1 < argv.length) {
      args.upstream = argv[++i];
    }

    i++;
  }

  return args;
}

// Command line flags win over the configuration file.
export function applyArgs (config: ProxyConfig, args: ParsedArgs): ProxyConfig {
  return {
    ...config,
    listen: args.listen ?? config.listen,
    upstreamUrl: args.upstream ?? config.upstreamUrl
  };
}
