import { StreamNotFoundError } from "../../core/stream/stream.errors";
import type { LeaseStore } from "../../ports/LeaseStore";
import type { StreamAdmin } from "../../ports/StreamAdmin";

/**
 * Tears down the stream and the lease table. Missing resources are not an error.
 */
export const deleteResources = async (deps: {
  admin: StreamAdmin;
  leaseStore: LeaseStore;
  streamName: string;
  applicationName: string;
}): Promise<void> => {
  const { admin, leaseStore, streamName, applicationName } = deps;

  console.log(JSON.stringify({ event: "resources.deleting_stream", streamName }));
  try {
    await admin.deleteStream(streamName);
  } catch (err) {
    if (!(err instanceof StreamNotFoundError)) throw err;
    console.log(JSON.stringify({ event: "resources.stream_missing", streamName }));
  }

  console.log(JSON.stringify({ event: "resources.deleting_lease_table", table: applicationName }));
  await leaseStore.drop();
  console.log(JSON.stringify({ event: "resources.deleted", streamName, table: applicationName }));
};
