import { env } from "./config/env.js";
import { buildApp } from "./app.js";

const fastify = await buildApp();

fastify.listen({ port: env.PORT, host: env.HOST }, function (err) {
  if (err) {
    fastify.log.error(err);
    process.exit(1);
  }
});
