import fp from "fastify-plugin";
import type { Kysely } from "kysely";
import { createDb, type Database } from "../config/db.js";

declare module "fastify" {
  interface FastifyInstance {
    db: Kysely<Database>;
  }
}

export interface DbPluginOptions {
  connectionString?: string;
}

export const dbPlugin = fp<DbPluginOptions>(async function dbPlugin(app, opts) {
  const db = createDb(opts.connectionString);
  app.decorate("db", db);

  app.addHook("onClose", async () => {
    await db.destroy();
  });
});
