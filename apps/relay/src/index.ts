import { env } from "./env.js";
import { buildApp } from "./app.js";
import { closeDb, db } from "./db/index.js";
import { redis } from "./db/redis.js";
import { RedisPendingEventQueue } from "./lib/pending-events.js";
import { DrizzleMatchStore } from "./store/match-store.js";

const app = await buildApp({
  store: new DrizzleMatchStore(db),
  queue: new RedisPendingEventQueue(redis, env.PENDING_EVENT_TTL_SECONDS),
  maxPayloadBytes: env.MAX_PAYLOAD_BYTES,
  corsOrigin: env.CORS_ORIGIN,
  onClose: async () => {
    await closeDb();
    await redis.quit();
  },
});

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    app.log.info(`${signal} received, shutting down`);
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error(err);
        process.exit(1);
      },
    );
  });
}

try {
  await app.listen({ port: env.PORT, host: env.HOST });
  app.log.info(`Relay running on http://localhost:${env.PORT}`);
} catch (err) {
  app.log.error(err);
  process.exit(1);
}
