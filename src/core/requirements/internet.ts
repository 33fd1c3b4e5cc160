/**
 * Network reachability probe.
 *
 * Tries a short TCP connect to literal addresses so the result does not
 * depend on DNS. Any successful connect means "reachable".
 */

import { createConnection } from 'node:net';

export interface ProbeTarget {
  host: string;
  port: number;
}

/** Two public resolvers on two different ports. */
export const DEFAULT_INTERNET_TARGETS: readonly ProbeTarget[] = [
  { host: '1.1.1.1', port: 443 },
  { host: '8.8.8.8', port: 53 },
];

const DEFAULT_TIMEOUT_MS = 2_000;

/**
 * Attempt a single TCP connect. Resolves true on connect, false on error
 * or timeout; never rejects.
 */
export function tryConnect(target: ProbeTarget, timeoutMs: number): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = createConnection({ host: target.host, port: target.port });
    const finish = (ok: boolean) => {
      socket.removeAllListeners();
      socket.on('error', () => undefined);
      socket.destroy();
      resolve(ok);
    };
    socket.setTimeout(timeoutMs);
    socket.once('connect', () => finish(true));
    socket.once('timeout', () => finish(false));
    socket.once('error', () => finish(false));
  });
}

/**
 * Build the `internet` probe. Targets are tried in order; the first
 * successful connect short-circuits.
 */
export function createInternetProbe(opts?: {
  targets?: readonly ProbeTarget[];
  timeoutMs?: number;
}): () => Promise<boolean> {
  const targets = opts?.targets ?? DEFAULT_INTERNET_TARGETS;
  const timeoutMs = opts?.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  return async () => {
    for (const target of targets) {
      if (await tryConnect(target, timeoutMs)) {
        return true;
      }
    }
    return false;
  };
}
