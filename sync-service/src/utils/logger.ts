type LogMode = 'dev' | 'prod';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogMeta = Record<string, unknown> | undefined;

function getLogMode(): LogMode {
  const raw = String(process.env.NOTESYNC_LOG_MODE ?? '').trim().toLowerCase();
  if (raw === 'dev' || raw === 'development') return 'dev';
  if (raw === 'prod' || raw === 'production') return 'prod';
  return process.env.NODE_ENV === 'development' ? 'dev' : 'prod';
}

function shouldLog(level: LogLevel, critical: boolean): boolean {
  if (critical) return true;
  const mode = getLogMode();
  if (mode === 'dev') return true;
  return level === 'warn' || level === 'error';
}

const SCOPE_KEYS = ['vaultId', 'noteId'] as const;

// vaultId/noteId выносятся в тег [vault/note], чтобы строки одной заметки легко грепались.
function splitScope(meta: Record<string, unknown>): { scope: string | null; rest: Record<string, unknown> } {
  const rest = { ...meta };
  const parts: string[] = [];
  for (const key of SCOPE_KEYS) {
    const value = rest[key];
    if (typeof value === 'string' && value) {
      parts.push(value);
      delete rest[key];
    }
  }
  return { scope: parts.length ? parts.join('/') : null, rest };
}

export function formatLine(level: LogLevel, message: string, meta?: LogMeta, ts = new Date()): string {
  const { scope, rest } = splitScope(meta ?? {});
  const base = `[${ts.toISOString()}] [${level.toUpperCase()}]${scope ? ` [${scope}]` : ''} ${message}`;
  if (Object.keys(rest).length === 0) return base;
  return `${base} ${JSON.stringify(rest)}`;
}

export function logInfo(message: string, meta?: LogMeta, opts?: { critical?: boolean }) {
  if (!shouldLog('info', opts?.critical === true)) return;
  // eslint-disable-next-line no-console
  console.log(formatLine('info', message, meta));
}

export function logWarn(message: string, meta?: LogMeta, opts?: { critical?: boolean }) {
  if (!shouldLog('warn', opts?.critical === true)) return;
  // eslint-disable-next-line no-console
  console.warn(formatLine('warn', message, meta));
}

export function logError(message: string, meta?: LogMeta) {
  if (!shouldLog('error', true)) return;
  // eslint-disable-next-line no-console
  console.error(formatLine('error', message, meta));
}

export function logDebug(message: string, meta?: LogMeta) {
  if (!shouldLog('debug', false)) return;
  // eslint-disable-next-line no-console
  console.log(formatLine('debug', message, meta));
}
