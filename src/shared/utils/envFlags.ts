// Shared helpers for reading environment flags from host code. Shared modules
// must stay loadable in a browser bundle, so process.env is only touched when
// it exists.

type ProcessEnv = Record<string, string | undefined>;
function getProcessEnv(): ProcessEnv | undefined {
  if (typeof process !== 'undefined' && typeof process.env === 'object') {
    return process.env;
  }
  return undefined;
}

export function readEnv(name: string): string | undefined {
  const value = getProcessEnv()?.[name];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Returns true if running inside a Jest worker process, even when NODE_ENV
 * was set to something else (for example by a local .env file).
 */
export function isJestRuntime(): boolean {
  return readEnv('JEST_WORKER_ID') !== undefined;
}
