import type { StartupErrorStore } from "../supervisor/artifact";
import { PortWaitTimeout, waitForPort, type PortProbe } from "../supervisor/port-probe";
import type { LocatedSupervisor } from "./locator";

export type ServiceStatus =
  | { ok: false; status: "startup_failed"; error: Record<string, unknown> }
  | { ok: false; status: "not_running" }
  | { ok: true; status: "running"; pid: number }
  | { ok: false; status: "not_responding"; pid: number }
  | { ok: false; status: "error"; error: string };

export interface ServiceStatusDeps {
  store: StartupErrorStore;
  locator: { locate(): Promise<LocatedSupervisor | null> };
  host: string;
  port: number;
  probe?: PortProbe;
  probeTimeoutMs?: number;
}

const DEFAULT_PROBE_TIMEOUT_MS = 5_000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Artifact content as stored; non-JSON content is wrapped as a message. */
export function describeArtifact(raw: string): Record<string, unknown> {
  try {
    const value: unknown = JSON.parse(raw);
    return isRecord(value) ? value : { message: raw };
  } catch {
    return { message: raw };
  }
}

export async function getServiceStatus(deps: ServiceStatusDeps): Promise<ServiceStatus> {
  try {
    const raw = await deps.store.readRaw();
    if (raw !== null) {
      return { ok: false, status: "startup_failed", error: describeArtifact(raw) };
    }

    const located = await deps.locator.locate();
    if (!located) {
      return { ok: false, status: "not_running" };
    }

    const probe = deps.probe ?? waitForPort;
    try {
      await probe({
        host: deps.host,
        port: deps.port,
        timeoutMs: deps.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS,
      });
    } catch (error) {
      if (error instanceof PortWaitTimeout) {
        return { ok: false, status: "not_responding", pid: located.pid };
      }
      throw error;
    }
    return { ok: true, status: "running", pid: located.pid };
  } catch (error) {
    return { ok: false, status: "error", error: error instanceof Error ? error.message : String(error) };
  }
}
