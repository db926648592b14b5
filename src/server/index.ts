import { loadDdiConfig, loadServerConfig } from "../config.js";
import { createDatabase, closeDatabase, migrate } from "../db/index.js";
import { DdiClient } from "../ddi/client.js";
import { serverLogger } from "../logger.js";
import { AttributeMapper } from "../mapping/attribute-mapper.js";
import {
  SqliteJobStore,
  SyncJobQueue,
  SyncOrchestrator,
} from "../services/sync/index.js";
import { buildServer } from "./app.js";

const config = loadServerConfig();
const ddiConfig = loadDdiConfig();

const db = createDatabase(config.dbPath);
await migrate(db);

const ddi = ddiConfig === null ? null : new DdiClient(ddiConfig);
if (ddi === null) {
  serverLogger.warn("DDI_HOST is not set; target endpoints will return 503");
}

const store = new SqliteJobStore(db);
const queue = new SyncJobQueue(new SyncOrchestrator(ddi, store), store);

const app = await buildServer({ ddi, queue, mapper: new AttributeMapper() });

app.addHook("onClose", async () => {
  await queue.shutdown();
  await ddi?.close();
  await closeDatabase(db);
});

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    app.log.info({ signal }, "Shutting down");
    app.close().then(
      () => process.exit(0),
      (error: unknown) => {
        app.log.error(error, "Error during shutdown");
        process.exit(1);
      }
    );
  });
}

// Start server
try {
  await app.listen({ port: config.port, host: config.host });
  app.log.info({ host: config.host, port: config.port }, "Server started");
} catch (err) {
  app.log.error(err, "Failed to start server");
  process.exit(1);
}
