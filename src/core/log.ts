export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

// undefined: not overridden; null: silenced
let levelOverride: LogLevel | null | undefined;

export function parseLogLevel(raw: string): LogLevel | null | undefined {
  const v = raw.trim().toLowerCase();
  if (!v) return undefined;
  if (v === 'silent' || v === 'off' || v === 'none' || v === '0') return null;
  if (v === 'debug' || v === 'info' || v === 'warn' || v === 'error') return v;
  return undefined;
}

/** Set by --verbose / --quiet; wins over the environment. */
export function setLogLevel(level: LogLevel | null): void {
  levelOverride = level;
}

function getConfiguredLevel(): LogLevel | null {
  if (levelOverride !== undefined) return levelOverride;
  const fromEnv = parseLogLevel(String(process.env.MANIFEST_DIFF_LOG_LEVEL ?? process.env.LOG_LEVEL ?? ''));
  return fromEnv === undefined ? 'warn' : fromEnv;
}

function serializeError(e: unknown): { name?: string; message?: string; stack?: string } | undefined {
  if (!e) return undefined;
  if (e instanceof Error) return { name: e.name, message: e.message, stack: e.stack };
  return { message: String(e) };
}

export interface Logger {
  debug(msg: string, fields?: Record<string, unknown>): void;
  info(msg: string, fields?: Record<string, unknown>): void;
  warn(msg: string, fields?: Record<string, unknown>): void;
  error(msg: string, fields?: Record<string, unknown>): void;
  child(fields: Record<string, unknown>): Logger;
  span<T>(name: string, fields: Record<string, unknown>, fn: () => Promise<T>): Promise<T>;
}

/** JSON lines on stderr; the level is read on every write. */
export function createLogger(baseFields: Record<string, unknown> = {}): Logger {
  const write = (level: LogLevel, msg: string, fields?: Record<string, unknown>) => {
    const configured = getConfiguredLevel();
    if (configured === null || levelOrder[level] < levelOrder[configured]) return;
    const rec = {
      ts: new Date().toISOString(),
      level,
      msg,
      ...baseFields,
      ...(fields ?? {}),
    };
    process.stderr.write(JSON.stringify(rec) + '\n');
  };

  return {
    debug: (msg, fields) => write('debug', msg, fields),
    info: (msg, fields) => write('info', msg, fields),
    warn: (msg, fields) => write('warn', msg, fields),
    error: (msg, fields) => write('error', msg, fields),
    child: (fields) => createLogger({ ...baseFields, ...fields }),
    span: async (name, fields, fn) => {
      const startedAt = Date.now();
      try {
        const out = await fn();
        write('debug', name, { ...fields, ok: true, duration_ms: Date.now() - startedAt });
        return out;
      } catch (e) {
        write('warn', name, { ...fields, ok: false, duration_ms: Date.now() - startedAt, err: serializeError(e) });
        throw e;
      }
    },
  };
}
