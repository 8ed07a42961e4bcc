import { createShutdownSignal } from "./lifecycle/shutdown";
import { settleExitCode } from "./lifecycle/process_runtime";
import { createLogger } from "./logging/logger";
import { runWorker } from "./worker/run_worker";

const log = createLogger({ service: "worker" });
const shutdown = createShutdownSignal(log);

void settleExitCode("worker", log, () => runWorker({ log, signal: shutdown.signal })).then((code) => {
  shutdown.dispose();
  process.exit(code);
});
