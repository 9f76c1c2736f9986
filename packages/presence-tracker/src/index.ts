import { loadConfig } from "./config.js";
import { buildServer } from "./server.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const app = await buildServer(config, {
    onFatal: (error) => {
      app.log.fatal({ err: error }, "presence pipeline invariant broken, shutting down");
      process.exitCode = 1;
      app.close().catch((closeError: unknown) => {
        app.log.error({ err: closeError }, "shutdown failed");
      });
    },
  });

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      app.log.info({ signal }, "shutting down");
      app.close().catch((error: unknown) => {
        app.log.error({ err: error }, "shutdown failed");
        process.exitCode = 1;
      });
    });
  }

  await app.listen({ host: config.host, port: config.port });
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
