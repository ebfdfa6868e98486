import pc from "picocolors";
import { setTimeout as sleep } from "node:timers/promises";
import { isProcessRunning } from "../../supervisor/process";
import { loadCommandContext } from "../context";

const STOP_POLL_MS = 200;

export async function stopSupervisor(options: { config?: string } = {}) {
  const ctx = loadCommandContext(options.config);
  const located = await ctx.locator.locate();
  if (!located) {
    console.error(pc.yellow("Supervisor is not running."));
    process.exitCode = 1;
    return;
  }

  const { pid } = located;
  console.log(`Stopping supervisor (PID: ${pid})...`);
  process.kill(pid, "SIGTERM");

  // Give the supervisor its own shutdown budget plus a margin for cleanup.
  const timeoutMs = ctx.config.supervisor.shutdownTimeoutMs * 2;
  const startedAt = Date.now();
  while (Date.now() - startedAt < timeoutMs) {
    if (!isProcessRunning(pid)) {
      console.log(pc.green("Supervisor stopped."));
      return;
    }
    await sleep(STOP_POLL_MS);
  }

  console.warn(pc.yellow(`Supervisor is still running after ${timeoutMs}ms. You may need to stop it manually.`));
  process.exitCode = 1;
}
