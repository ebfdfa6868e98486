import net from "node:net";
import { setTimeout as sleep } from "node:timers/promises";

export interface PortWaitOptions {
  host: string;
  port: number;
  timeoutMs: number;
  intervalMs?: number;
  signal?: AbortSignal;
}

/**
 * Resolves once the port accepts a TCP connection. Rejects with a
 * `PortWaitTimeout` when `timeoutMs` runs out, or with the abort reason.
 */
export type PortProbe = (options: PortWaitOptions) => Promise<void>;

export class PortWaitTimeout extends Error {
  constructor(host: string, port: number, timeoutMs: number) {
    super(`Port ${host}:${port} not reachable within ${timeoutMs}ms`);
    this.name = "PortWaitTimeout";
  }
}

const DEFAULT_INTERVAL_MS = 500;
const CONNECT_TIMEOUT_MS = 2_000;

export function canConnect(host: string, port: number, timeoutMs = CONNECT_TIMEOUT_MS): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = net.connect({ host, port });
    const finish = (reachable: boolean) => {
      socket.removeAllListeners();
      socket.destroy();
      resolve(reachable);
    };
    socket.setTimeout(timeoutMs);
    socket.once("connect", () => finish(true));
    socket.once("timeout", () => finish(false));
    socket.once("error", () => finish(false));
  });
}

export const waitForPort: PortProbe = async (options) => {
  const intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
  const deadline = Date.now() + options.timeoutMs;

  while (true) {
    options.signal?.throwIfAborted();
    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      throw new PortWaitTimeout(options.host, options.port, options.timeoutMs);
    }
    if (await canConnect(options.host, options.port, Math.min(CONNECT_TIMEOUT_MS, remaining))) {
      return;
    }
    const pause = Math.min(intervalMs, deadline - Date.now());
    if (pause > 0) {
      await sleep(pause, undefined, { signal: options.signal });
    }
  }
};
