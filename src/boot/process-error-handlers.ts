import { logger } from "../logger";

declare global {
  // eslint-disable-next-line no-var
  var __wardenProcessErrorHandlersRegistered: boolean | undefined;
}

export function registerProcessErrorHandlers(): void {
  if (globalThis.__wardenProcessErrorHandlersRegistered) {
    return;
  }
  globalThis.__wardenProcessErrorHandlersRegistered = true;

  process.on("unhandledRejection", (reason) => {
    logger.error({ err: reason }, "Unhandled rejection");
  });

  process.on("uncaughtException", (error) => {
    logger.fatal({ err: error }, "Uncaught exception");
    process.exitCode = 1;
  });
}
