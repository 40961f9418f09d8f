export interface CliArgs {
  root: string;
  port: number;
  host: string;
  bufferSize: number;
  timeoutMs: number;
  quiet: boolean;
  /** Set when the run should print something and exit instead of serving. */
  action?: "help" | "version";
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export const HELP_TEXT = `
plainserve - answer one HTTP request per connection

Usage: plainserve [directory] [options]

Serves GET / and GET /static/* from the directory (default: current
directory) and echoes JSON or form bodies POSTed to /submit.

Options:
  --port, -p <port>    Port to listen on (default: 8080)
  --host, -H <host>    Host to bind (default: 127.0.0.1)
  --buffer-size <n>    Bytes read per request; larger requests are truncated (default: 4096)
  --timeout <ms>       Give up on clients that send nothing for this long (default: 0, never)
  --quiet, -q          Suppress request logging
  --version, -v        Show version
  --help, -h           Show this help
`;

export function parseArgs(args: string[]): CliArgs {
  const parsed: CliArgs = {
    root: ".",
    port: 8080,
    host: "127.0.0.1",
    bufferSize: 4096,
    timeoutMs: 0,
    quiet: false,
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    if (arg === "--port" || arg === "-p") {
      parsed.port = parseInteger(arg, args[++i], 0, 65535);
    } else if (arg === "--host" || arg === "-H") {
      parsed.host = requireValue(arg, args[++i]);
    } else if (arg === "--buffer-size") {
      parsed.bufferSize = parseInteger(arg, args[++i], 1, Number.MAX_SAFE_INTEGER);
    } else if (arg === "--timeout") {
      parsed.timeoutMs = parseInteger(arg, args[++i], 0, Number.MAX_SAFE_INTEGER);
    } else if (arg === "--quiet" || arg === "-q") {
      parsed.quiet = true;
    } else if (arg === "--version" || arg === "-v") {
      parsed.action = "version";
    } else if (arg === "--help" || arg === "-h") {
      parsed.action = "help";
    } else if (!arg.startsWith("-")) {
      parsed.root = arg;
    } else {
      throw new CliUsageError(`Unknown option: ${arg}`);
    }
    i++;
  }

  return parsed;
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value === "") {
    throw new CliUsageError(`Missing value for ${flag}`);
  }
  return value;
}

function parseInteger(
  flag: string,
  value: string | undefined,
  min: number,
  max: number,
): number {
  const raw = requireValue(flag, value);
  if (!/^\d+$/.test(raw)) {
    throw new CliUsageError(`Invalid value for ${flag}: ${raw}`);
  }
  const n = Number.parseInt(raw, 10);
  if (n < min || n > max) {
    throw new CliUsageError(`Value for ${flag} out of range: ${raw}`);
  }
  return n;
}
