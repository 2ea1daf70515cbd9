import fp from "fastify-plugin";
import { sql, type Kysely } from "kysely";
import type { Database } from "../config/db.js";

declare module "fastify" {
  interface FastifyInstance {
    db: Kysely<Database>;
  }
}

export interface DbPluginOptions {
  db: Kysely<Database>;
}

/** Exposes the Kysely instance, a readiness check, and closes the pool with the app. */
export const dbPlugin = fp<DbPluginOptions>(async function dbPlugin(app, opts) {
  app.decorate("db", opts.db);

  app.get("/ready", async function (_, reply) {
    try {
      await sql`select 1`.execute(app.db);
      return { status: "ready" };
    } catch (err) {
      app.log.warn({ err }, "readiness check failed");
      return reply.status(503).send({ status: "unavailable" });
    }
  });

  app.addHook("onClose", async () => {
    await opts.db.destroy();
  });
});
