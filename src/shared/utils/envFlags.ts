// Shared helpers for reading environment flags from engine code. The engine
// never imports the host logger; its only diagnostics are gated console
// traces switched on by these flags.

type ProcessEnv = Record<string, string | undefined>;
function getProcessEnv(): ProcessEnv | undefined {
  if (typeof process !== 'undefined' && typeof process.env === 'object') {
    return process.env;
  }
  return undefined;
}

export function readEnv(name: string): string | undefined {
  const env = getProcessEnv();
  if (env) {
    const value = env[name];
    if (typeof value === 'string') {
      return value;
    }
  }

  return undefined;
}

/**
 * Returns true if running in a test environment (NODE_ENV === 'test').
 */
export function isTestEnvironment(): boolean {
  return readEnv('NODE_ENV') === 'test';
}

/**
 * Returns true if running inside a Jest worker process, even when NODE_ENV
 * was set to something else by a .env file.
 */
export function isJestRuntime(): boolean {
  return readEnv('JEST_WORKER_ID') !== undefined;
}

export function flagEnabled(name: string): boolean {
  const raw = readEnv(name);
  if (!raw) return false;
  return raw === '1' || raw === 'true' || raw === 'TRUE';
}

/** QSS_DEBUG_COMMIT=1 traces every commit attempt to the console. */
export function isCommitDebugEnabled(): boolean {
  return flagEnabled('QSS_DEBUG_COMMIT');
}

/**
 * Conditional debug logging.
 *
 * @example
 * debugLog(isCommitDebugEnabled(), '[commitTurn] rejected', { code });
 */
export function debugLog(condition: boolean, ...args: unknown[]): void {
  if (condition) {
    // eslint-disable-next-line no-console
    console.log(...args);
  }
}
