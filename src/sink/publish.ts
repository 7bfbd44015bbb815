import { errorMessage, Logger } from "../observability";

/** Runs one sink publication. A failure is logged and does not reach the caller. */
export async function publishSafely(logger: Logger, stage: string, publish: () => Promise<void>): Promise<boolean> {
  try {
    await publish();
    return true;
  } catch (error) {
    logger.warn("sink_publish_failed", { stage, error: errorMessage(error) });
    return false;
  }
}
