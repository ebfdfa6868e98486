import fs from "node:fs";
import path from "node:path";
import { logger } from "../logger";
import { isProcessRunning } from "../supervisor/process";

/**
 * PID file owned by the running supervisor.
 */
export class PidFile {
  constructor(readonly filePath: string) {}

  /** Claims the file for `pid`; throws when another live process owns it. */
  write(pid: number = process.pid): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    if (this.checkExisting()) {
      throw new Error(`Supervisor is already running (PID file ${this.filePath} is held by a live process).`);
    }
    fs.writeFileSync(this.filePath, pid.toString(), "utf8");
  }

  /** Removes the file, but only when it still names `pid`. */
  remove(pid: number = process.pid): void {
    if (this.read() === pid) {
      fs.unlinkSync(this.filePath);
    }
  }

  /** True when the file names a live process; a stale file is deleted. */
  checkExisting(): boolean {
    if (!fs.existsSync(this.filePath)) {
      return false;
    }
    const pid = this.read();
    if (pid !== null && isProcessRunning(pid)) {
      return true;
    }
    logger.warn({ pid, pidFile: this.filePath }, "Stale PID file found; cleaning up");
    fs.rmSync(this.filePath, { force: true });
    return false;
  }

  read(): number | null {
    if (!fs.existsSync(this.filePath)) {
      return null;
    }
    const content = fs.readFileSync(this.filePath, "utf8").trim();
    const pid = Number.parseInt(content, 10);
    return Number.isNaN(pid) ? null : pid;
  }
}
