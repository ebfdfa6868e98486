import { Command } from "commander";
import { APP_VERSION } from "../version";

const program = new Command()
  .name("warden")
  .description("Supervise a long-lived network service and reconcile its scheduled jobs")
  .version(APP_VERSION);

program
  .command("supervise")
  .description("Run the service in the foreground, restarting it on crash")
  .option("-c, --config <path>", "Config file path")
  .action(async (options: { config?: string }) => {
    const { superviseCommand } = await import("./commands/supervise");
    await superviseCommand(options);
  });

program
  .command("ensure")
  .description("Start the supervisor in the background unless it is already up")
  .option("-c, --config <path>", "Config file path")
  .action(async (options: { config?: string }) => {
    const { ensureService } = await import("./commands/ensure");
    await ensureService(options);
  });

program
  .command("status")
  .description("Show whether the service is running or why it failed to start")
  .option("-c, --config <path>", "Config file path")
  .option("--json", "Output machine-readable JSON")
  .action(async (options: { config?: string; json?: boolean }) => {
    const { showStatus } = await import("./commands/status");
    await showStatus(options);
  });

program
  .command("stop")
  .description("Stop a running supervisor")
  .option("-c, --config <path>", "Config file path")
  .action(async (options: { config?: string }) => {
    const { stopSupervisor } = await import("./commands/stop");
    await stopSupervisor(options);
  });

program
  .command("reconcile")
  .description("Merge declared jobs into the runtime jobs file")
  .option("-c, --config <path>", "Config file path")
  .action(async (options: { config?: string }) => {
    const { reconcileCommand } = await import("./commands/reconcile");
    await reconcileCommand(options);
  });

const configCmd = program.command("config").description("Inspect configuration");

configCmd
  .command("validate")
  .description("Validate the config file")
  .option("-c, --config <path>", "Config file path")
  .action(async (options: { config?: string }) => {
    const { validateConfig } = await import("./commands/config");
    await validateConfig(options.config);
  });

await program.parseAsync(process.argv);
