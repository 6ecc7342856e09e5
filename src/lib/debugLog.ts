/**
 * Parse the debug flag in a way that works with HashRouter.
 *
 * Supports:
 *  - ?debug=1#/
 *  - #/?debug=1
 */
export function isDebugEnabled(): boolean {
  if (typeof window === 'undefined') return false;

  const fromSearch = new URLSearchParams(window.location.search).get('debug');
  if (fromSearch != null) return fromSearch === '1' || fromSearch === 'true';

  const hash = window.location.hash || '';
  const q = hash.indexOf('?');
  if (q >= 0) {
    const fromHash = new URLSearchParams(hash.slice(q + 1)).get('debug');
    if (fromHash != null) return fromHash === '1' || fromHash === 'true';
  }
  return false;
}

export type Logger = {
  debug: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
};

/** Console logger with a `[scope]` prefix. `debug` output only appears with the debug flag set. */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug: (...args) => {
      if (isDebugEnabled()) console.debug(prefix, ...args);
    },
    warn: (...args) => console.warn(prefix, ...args),
    error: (...args) => console.error(prefix, ...args)
  };
}
