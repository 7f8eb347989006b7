import { runConsumer, runDeleteResources } from "../composition/root";
import { buildCliErrorEnvelope, installShutdownHandler, isDebugMode } from "./cli.shared";

export class UsageError extends Error {
  readonly code = "usage";

  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const runCommand = async (argv: string[], signal: AbortSignal): Promise<boolean> => {
  const [command, ...rest] = argv;
  if (rest.length > 0 || (command != null && command !== "delete-resources")) {
    throw new UsageError(`Unknown arguments: ${argv.join(" ")}. Usage: consume [delete-resources]`);
  }

  if (command === "delete-resources") {
    await runDeleteResources();
    return true;
  }

  const summary = await runConsumer(signal);
  return summary.failed === 0;
};

export const executeConsumerCli = async (argv: string[] = process.argv.slice(2)): Promise<void> => {
  const shutdown = installShutdownHandler();
  let ok: boolean;
  try {
    ok = await runCommand(argv, shutdown.signal);
  } catch (err) {
    const envelope = buildCliErrorEnvelope("consumer.failed", err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    ok = false;
  } finally {
    shutdown.dispose();
  }

  // A failed shard worker has already been logged by the coordinator.
  if (!ok) process.exit(1);
};

if (require.main === module) {
  void executeConsumerCli();
}
