import { runProducer } from "../composition/root";
import { buildCliErrorEnvelope, installShutdownHandler, isDebugMode } from "./cli.shared";

export const executeProducerCli = async (): Promise<void> => {
  const shutdown = installShutdownHandler();
  try {
    await runProducer(shutdown.signal);
  } catch (err) {
    const envelope = buildCliErrorEnvelope("producer.failed", err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    process.exit(1);
  } finally {
    shutdown.dispose();
  }
};

if (require.main === module) {
  void executeProducerCli();
}
