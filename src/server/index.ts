import { loadPipelineConfig } from "../config/index.js";
import { closeConnection, db } from "../db/connection.js";
import { KyselyWarehouseStore } from "../db/warehouse.js";
import { fastifyLoggerConfig } from "../logger.js";
import { buildApp } from "./app.js";

const PORT = Number.parseInt(process.env.PORT ?? "3000", 10);
const HOST = process.env.HOST ?? "0.0.0.0";

const config = loadPipelineConfig();

const app = await buildApp(
  {
    store: new KyselyWarehouseStore(db, { chunkSize: config.staging.chunkSize }),
    config,
  },
  { logger: fastifyLoggerConfig }
);

app.addHook("onClose", async () => {
  await closeConnection();
});

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    void app.close();
  });
}

try {
  await app.listen({ port: PORT, host: HOST });
  app.log.info({ host: HOST, port: PORT }, "Server started");
} catch (err) {
  app.log.error(err, "Failed to start server");
  process.exit(1);
}
