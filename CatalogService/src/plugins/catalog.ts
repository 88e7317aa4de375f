import type { FastifyInstance } from "fastify";
import fp from "fastify-plugin";
import {
  getServiceDependencies,
  type ServiceDependencies,
} from "../services/dependencies";
import type { CatalogService } from "../services/catalog-service";
import type { LifecycleEventWorker } from "../services/lifecycle-event-worker";

declare module "fastify" {
  interface FastifyInstance {
    catalogService: CatalogService;
    lifecycleWorker: LifecycleEventWorker;
  }
}

export interface CatalogPluginOptions {
  dependencies?: ServiceDependencies;
}

async function catalogPlugin(fastify: FastifyInstance, options: CatalogPluginOptions) {
  const dependencies = options.dependencies ?? getServiceDependencies();

  fastify.decorate("catalogService", dependencies.catalogService);
  fastify.decorate("lifecycleWorker", dependencies.worker);

  fastify.addHook("onClose", async () => {
    await dependencies.repository.close();
  });
}

export default fp(catalogPlugin, { name: "catalog" });
