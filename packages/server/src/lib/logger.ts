const LEVELS = { debug: 0, info: 1, warn: 2, error: 3 } as const;
type Level = keyof typeof LEVELS;

function isLevel(value: string): value is Level {
  return value in LEVELS;
}

function getThreshold(): number {
  const env = (process.env['LOG_LEVEL'] ?? 'info').toLowerCase();
  return isLevel(env) ? LEVELS[env] : LEVELS.info;
}

/** LOG_FORMAT=pretty prints `HH:MM:SS LEVEL [ns] msg` for interactive CLI runs */
function isPretty(): boolean {
  return process.env['LOG_FORMAT'] === 'pretty';
}

export interface Logger {
  debug(msg: string, data?: unknown): void;
  info(msg: string, data?: unknown): void;
  warn(msg: string, data?: unknown): void;
  error(msg: string, data?: unknown): void;
}

function formatPretty(level: Level, namespace: string, msg: string, data?: unknown): string {
  const time = new Date().toISOString().slice(11, 19);
  const suffix = data === undefined ? '' : ` ${JSON.stringify(data)}`;
  return `${time} ${level.toUpperCase().padEnd(5)} [${namespace}] ${msg}${suffix}`;
}

export function createLogger(namespace: string): Logger {
  const write = (level: Level, msg: string, data?: unknown) => {
    if (LEVELS[level] < getThreshold()) return;
    let line: string;
    if (isPretty()) {
      line = formatPretty(level, namespace, msg, data);
    } else {
      const entry: Record<string, unknown> = {
        ts: new Date().toISOString(),
        level,
        ns: namespace,
        msg,
      };
      if (data !== undefined) entry['data'] = data;
      line = JSON.stringify(entry);
    }
    if (level === 'error') process.stderr.write(line + '\n');
    else process.stdout.write(line + '\n');
  };

  return {
    debug: (msg, data?) => write('debug', msg, data),
    info: (msg, data?) => write('info', msg, data),
    warn: (msg, data?) => write('warn', msg, data),
    error: (msg, data?) => write('error', msg, data),
  };
}
