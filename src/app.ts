import Fastify, { type FastifyInstance } from "fastify";
import { env, selectionDefaults, type Env } from "./config/env.js";
import { dbPlugin } from "./plugins/db.plugin.js";
import { selectFromBody, selectFromCatalog, type SelectionControllerDeps } from "./modules/selection.controller.js";
import { fileCityCatalog, type CityCatalog } from "../services/catalog/city-catalog.js";
import { PostgresCityCatalog } from "../services/queries/catalog.query.js";
import { createLoggerSink } from "../services/selection/notices.js";

export interface AppOptions {
  config?: Env;
  /** Overrides the catalog chosen from config (file, else Postgres). */
  catalog?: CityCatalog;
  logger?: boolean;
}

export async function buildApp(options: AppOptions = {}): Promise<FastifyInstance> {
  const config = options.config ?? env;

  const fastify = Fastify({
    logger: options.logger === false ? false : { level: config.LOG_LEVEL },
  });

  let catalog = options.catalog;
  if (!catalog && config.CITY_CATALOG_FILE) {
    catalog = fileCityCatalog(config.CITY_CATALOG_FILE);
  }
  if (!catalog) {
    await fastify.register(dbPlugin, { connectionString: config.DATABASE_URL });
    catalog = new PostgresCityCatalog(fastify.db);
  }

  const defaults = selectionDefaults(config);
  const source = catalog;

  fastify.get("/health", function (_, reply) {
    reply.send({ status: "ok" });
  });

  fastify.get("/selection", async function (request, reply) {
    // Pass raw query; Zod is the single source of validation.
    const deps: SelectionControllerDeps = { catalog: source, defaults, sink: createLoggerSink(request.log) };
    const result = await selectFromCatalog(request.query, deps);

    if ("status" in result) {
      return reply.status(result.status).send({ error: result.error, code: result.code });
    }
    return reply.send(result);
  });

  fastify.post("/selection", async function (request, reply) {
    const deps: SelectionControllerDeps = { catalog: source, defaults, sink: createLoggerSink(request.log) };
    const result = await selectFromBody(request.body, deps);

    if ("status" in result) {
      return reply.status(result.status).send({ error: result.error, code: result.code });
    }
    return reply.send(result);
  });

  return fastify;
}
