import { buildApp } from "./server.js";
import { loadRuntimeConfig } from "./infra/config.js";

const config = loadRuntimeConfig();
const app = buildApp(config);

async function shutdown(signal: NodeJS.Signals): Promise<void> {
  app.log.info({ signal }, "Shutting down");
  await app.close();
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      app.log.error({ err: error }, "Shutdown failed");
      process.exit(1);
    });
  });
}

app
  .listen({ port: config.port, host: config.host })
  .then(() => {
    app.log.info(`${config.serviceName} listening on http://${config.host}:${config.port}`);
  })
  .catch((error: unknown) => {
    app.log.error({ err: error }, "Failed to start");
    process.exit(1);
  });
