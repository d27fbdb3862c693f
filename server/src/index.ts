import { DB_PATH, HOST, PORT } from "./config.js";
import { closeDb, openDb } from "./db/index.js";
import { runMigrations } from "./db/migrate.js";
import { buildApp } from "./app.js";
import { createMessageStore } from "./modules/messages/index.js";

async function main() {
  const db = openDb(DB_PATH);
  const app = await buildApp({ store: createMessageStore(db) });
  runMigrations(db, app.log);

  app.addHook("onClose", async () => {
    closeDb(db);
  });

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      app.log.info({ signal }, "Shutting down");
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          app.log.error({ err }, "Shutdown failed");
          process.exit(1);
        },
      );
    });
  }

  await app.listen({ port: PORT, host: HOST });
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
