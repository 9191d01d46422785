import type { Logger } from "pino";

const terminationSignals = ["SIGINT", "SIGTERM"] as const;

export function createProcessSignalAbortController(logger: Logger): AbortController {
  const abortController = new AbortController();

  for (const signal of terminationSignals) {
    process.once(signal, () => {
      logger.info({ signal }, "received %s, stopping after the current cycle", signal);
      abortController.abort(signal);
    });
  }

  return abortController;
}
