import { execa } from "execa";
import { logger } from "../logger";
import { isProcessRunning } from "../supervisor/process";
import type { PidFile } from "./pid-file";

export interface ProcessEntry {
  pid: number;
  args: string;
}

export interface LocatedSupervisor {
  pid: number;
  source: "pid_file" | "process_table";
  command?: string;
}

export type ProcessLister = () => Promise<ProcessEntry[]>;

export function parseProcessTable(stdout: string): ProcessEntry[] {
  const entries: ProcessEntry[] = [];
  for (const line of stdout.split("\n")) {
    const match = /^\s*(\d+)\s+(.*\S)\s*$/.exec(line);
    if (!match?.[1] || !match[2]) {
      continue;
    }
    entries.push({ pid: Number.parseInt(match[1], 10), args: match[2] });
  }
  return entries;
}

export const listProcesses: ProcessLister = async () => {
  const result = await execa("ps", ["-eo", "pid=,args="], { reject: true });
  return parseProcessTable(result.stdout);
};

/** Matches `warden supervise` however it was launched (bin shim, node, tsx). */
export function isSupervisorCommand(args: string): boolean {
  const tokens = args.split(/\s+/);
  const supervise = tokens.indexOf("supervise");
  if (supervise <= 0) {
    return false;
  }
  return tokens
    .slice(0, supervise)
    .some((token) => /(^|[\\/])warden(\.[cm]?[jt]s)?$/.test(token) || /[\\/]cli[\\/]index\.[cm]?[jt]s$/.test(token));
}

/**
 * Finds a supervisor that is already running: first through the PID file,
 * then by scanning the process table.
 */
export class SupervisorLocator {
  constructor(
    private readonly pidFile: PidFile,
    private readonly lister: ProcessLister = listProcesses,
    private readonly selfPid: number = process.pid,
  ) {}

  async locate(): Promise<LocatedSupervisor | null> {
    const pid = this.pidFile.read();
    if (pid !== null && pid !== this.selfPid && isProcessRunning(pid)) {
      return { pid, source: "pid_file" };
    }

    let entries: ProcessEntry[];
    try {
      entries = await this.lister();
    } catch (error) {
      logger.warn({ err: error }, "Could not list processes; assuming no supervisor is running");
      return null;
    }
    const found = entries.find((entry) => entry.pid !== this.selfPid && isSupervisorCommand(entry.args));
    return found ? { pid: found.pid, source: "process_table", command: found.args } : null;
  }
}
