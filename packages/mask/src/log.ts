/**
 * Minimal logging seam.
 *
 * Everything goes to stderr with a "[mask]" prefix so masked payloads
 * written to stdout are never interleaved with diagnostics. Embedders
 * can pass their own logger to route messages elsewhere.
 */

export interface MaskLogger {
  info(message: string): void;
  error(message: string, err?: unknown): void;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export const consoleLogger: MaskLogger = {
  info(message) {
    console.error(`[mask] ${message}`);
  },
  error(message, err) {
    if (err === undefined) {
      console.error(`[mask] ${message}`);
    } else {
      console.error(`[mask] ${message}:`, errorMessage(err));
    }
  },
};

/** Drops everything. Handy for tests and for embedders that want silence. */
export const silentLogger: MaskLogger = {
  info() {},
  error() {},
};
