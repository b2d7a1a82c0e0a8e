import { runLicenseScheduler } from "../app/cron/run-scheduler.server";
import { logger } from "../app/utils/logger.server";

const controller = new AbortController();

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    controller.abort();
  });
}

runLicenseScheduler(controller.signal)
  .then((r) => {
    process.stdout.write(JSON.stringify(r) + "\n");
    process.exit(0);
  })
  .catch((e: unknown) => {
    logger.error("License scheduler exited with an error", e);
    process.exit(1);
  });
