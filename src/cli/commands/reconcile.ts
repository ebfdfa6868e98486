import pc from "picocolors";
import { syncDeclaredJobs } from "../../jobs/sync";
import { loadCommandContext } from "../context";

export async function reconcileCommand(options: { config?: string } = {}) {
  const ctx = loadCommandContext(options.config);
  const result = await syncDeclaredJobs(ctx.config.reconcile);

  switch (result.status) {
    case "skipped":
      console.log(
        pc.yellow(
          result.reason === "no_declared_file"
            ? "No declared jobs file found; nothing to reconcile."
            : "No runtime jobs file configured; nothing to reconcile.",
        ),
      );
      return;
    case "malformed":
      console.error(pc.red(`Declared jobs are invalid: ${result.error.message}`));
      process.exitCode = 1;
      return;
    case "reconciled": {
      const { total, updated, added, kept } = result.summary;
      console.log(pc.green(`Reconciled ${result.declaredPath} into ${result.runtimePath}`));
      console.log(`  ${total} jobs: ${updated} updated, ${added} added, ${kept} kept`);
    }
  }
}
