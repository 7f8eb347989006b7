import { Coordinator, type CoordinatorSummary } from "../application/consume/coordinator";
import { createRecordProcessorFactory } from "../application/consume/recordProcessor";
import { createSampleRecordHandler, sampleRecordDecoder } from "../application/consume/sampleRecordHandler";
import { ensureStreamActive } from "../application/produce/ensureStreamActive";
import { produceRecords } from "../application/produce/produceRecords.usecase";
import { deleteResources } from "../application/resources/deleteResources.usecase";
import { createWorkerId } from "../core/lease/Lease";
import { MongoLeaseStore } from "../infrastructure/mongo/MongoLeaseStore";
import { StreamHttpClient } from "../infrastructure/stream-http/StreamHttpClient";
import { loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";

export const runConsumer = async (signal: AbortSignal): Promise<CoordinatorSummary> => {
  const env = loadEnv();
  const { consumerConfig, timeoutMs } = loadRuntimeConfigFromEnv();

  const client = new StreamHttpClient(env.STREAM_BASE_URL, timeoutMs);
  const leaseStore = new MongoLeaseStore(env.MONGO_URI, env.APP_NAME);
  const workerId = createWorkerId();

  console.log(JSON.stringify({
    event: "consumer.starting",
    applicationName: env.APP_NAME,
    streamName: env.STREAM_NAME,
    workerId
  }));

  const coordinator = new Coordinator({
    streamName: env.STREAM_NAME,
    workerId,
    source: client,
    leaseStore,
    processorFactory: createRecordProcessorFactory({
      decoder: sampleRecordDecoder,
      handler: createSampleRecordHandler(),
      config: consumerConfig
    }),
    config: consumerConfig,
    signal
  });

  try {
    return await coordinator.run();
  } finally {
    await leaseStore.close();
  }
};

export const runDeleteResources = async (): Promise<void> => {
  const env = loadEnv();
  const { timeoutMs } = loadRuntimeConfigFromEnv();

  const client = new StreamHttpClient(env.STREAM_BASE_URL, timeoutMs);
  const leaseStore = new MongoLeaseStore(env.MONGO_URI, env.APP_NAME);

  try {
    await deleteResources({
      admin: client,
      leaseStore,
      streamName: env.STREAM_NAME,
      applicationName: env.APP_NAME
    });
  } finally {
    await leaseStore.close();
  }
};

export const runProducer = async (signal: AbortSignal): Promise<number> => {
  const env = loadEnv();
  const { producerConfig, timeoutMs } = loadRuntimeConfigFromEnv();
  const client = new StreamHttpClient(env.STREAM_BASE_URL, timeoutMs);

  if (!(await ensureStreamActive(client, env.STREAM_NAME, { config: producerConfig, signal }))) {
    return 0;
  }
  console.log(JSON.stringify({ event: "producer.streams", streamNames: await client.listStreams() }));

  return produceRecords({
    writer: client,
    streamName: env.STREAM_NAME,
    config: producerConfig,
    signal
  });
};
