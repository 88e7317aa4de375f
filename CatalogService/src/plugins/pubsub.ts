import { PubSub, type ClientConfig } from "@google-cloud/pubsub";
import type { FastifyInstance } from "fastify";
import fp from "fastify-plugin";
import type { Env } from "../config";
import { decodeServiceAccountKey } from "../utils/gcp-credentials";

declare module "fastify" {
  interface FastifyInstance {
    pubsub: PubSub;
  }
}

export interface PubSubPluginOptions {
  config: Env;
}

async function pubsubPlugin(fastify: FastifyInstance, options: PubSubPluginOptions) {
  const { config } = options;
  const clientConfig: ClientConfig = { projectId: config.GCP_PROJECT_ID };
  if (config.GCP_SERVICE_ACCOUNT_KEY) {
    clientConfig.credentials = decodeServiceAccountKey(config.GCP_SERVICE_ACCOUNT_KEY);
  }
  const pubsub = new PubSub(clientConfig);

  fastify.decorate("pubsub", pubsub);

  fastify.addHook("onClose", async () => {
    await pubsub.close();
  });
}

export default fp(pubsubPlugin, { name: "pubsub" });
