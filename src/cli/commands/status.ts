import pc from "picocolors";
import { getServiceStatus, type ServiceStatus } from "../../service/status";
import { loadCommandContext } from "../context";

export function formatStatus(status: ServiceStatus): string {
  switch (status.status) {
    case "running":
      return `${pc.green("running")} (PID: ${status.pid})`;
    case "not_running":
      return pc.yellow("not running");
    case "not_responding":
      return `${pc.yellow("not responding")} (PID: ${status.pid})`;
    case "startup_failed": {
      const message = typeof status.error.message === "string" ? status.error.message : JSON.stringify(status.error);
      const kind = typeof status.error.error === "string" ? ` [${status.error.error}]` : "";
      return `${pc.red("startup failed")}${kind}: ${message}`;
    }
    case "error":
      return `${pc.red("error")}: ${status.error}`;
  }
}

export async function showStatus(options: { config?: string; json?: boolean } = {}) {
  const ctx = loadCommandContext(options.config);
  const status = await getServiceStatus({
    store: ctx.store,
    locator: ctx.locator,
    host: ctx.config.service.host,
    port: ctx.config.service.port,
  });

  if (options.json) {
    console.log(JSON.stringify(status, null, 2));
  } else {
    console.log(`Service: ${formatStatus(status)}`);
    if (status.status === "startup_failed" && typeof status.error.stderr === "string" && status.error.stderr) {
      console.log(pc.dim(status.error.stderr));
    }
    console.log(pc.dim(`Config: ${ctx.configPath}`));
  }
  if (!status.ok) {
    process.exitCode = 1;
  }
}
