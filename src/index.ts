import { runApi } from "./api_server";
import { createShutdownSignal } from "./lifecycle/shutdown";
import { settleExitCode } from "./lifecycle/process_runtime";
import { createLogger } from "./logging/logger";

const log = createLogger({ service: "api" });
const shutdown = createShutdownSignal(log);

void settleExitCode("api", log, () => runApi({ log, fastifyLogger: log, signal: shutdown.signal })).then((code) => {
  shutdown.dispose();
  process.exit(code);
});
