import Fastify from "fastify";
import {
  serializerCompiler,
  validatorCompiler,
  type ZodTypeProvider,
} from "fastify-type-provider-zod";
import sensible from "@fastify/sensible";
import helmet from "@fastify/helmet";
import cors from "@fastify/cors";
import { loadConfig, type Env } from "./config";
import serviceAuthPlugin from "./plugins/service-auth";
import pubsubPlugin from "./plugins/pubsub";
import catalogPlugin from "./plugins/catalog";
import lifecycleEventsSubscriber from "./subscribers/lifecycle-events";
import internalRoutes from "./routes/internal";
import type { ServiceDependencies } from "./services/dependencies";

export interface BuildAppOptions {
  config?: Env;
  dependencies?: ServiceDependencies;
}

export async function buildApp(options: BuildAppOptions = {}) {
  const config = options.config ?? loadConfig();

  const app = Fastify({
    logger: {
      level: config.LOG_LEVEL,
      transport:
        config.NODE_ENV === "development"
          ? {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "SYS:standard",
            },
          }
          : undefined,
    },
    trustProxy: true,
    bodyLimit: config.HTTP_BODY_LIMIT,
  }).withTypeProvider<ZodTypeProvider>();

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  await app.register(sensible);
  await app.register(cors, { origin: false });
  await app.register(helmet, { contentSecurityPolicy: false });
  await app.register(catalogPlugin, { dependencies: options.dependencies });

  if (config.ASSET_REGISTERED_SUBSCRIPTION || config.ASSET_FINALIZED_SUBSCRIPTION) {
    await app.register(pubsubPlugin, { config });
    await app.register(lifecycleEventsSubscriber, { config });
  }

  await app.register(serviceAuthPlugin, {
    token: config.SERVICE_AUTH_TOKEN,
    prefix: "/internal",
  });
  await app.register(internalRoutes, { prefix: "/internal" });

  app.get("/health", async () => ({ status: "ok" }));

  return app;
}
