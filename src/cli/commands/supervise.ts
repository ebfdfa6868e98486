import { runSupervise } from "../../boot/boot";

export async function superviseCommand(options: { config?: string } = {}) {
  process.exitCode = await runSupervise({ config: options.config });
}
