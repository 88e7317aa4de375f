import type { Message, Subscription } from "@google-cloud/pubsub";
import type { FastifyInstance } from "fastify";
import fp from "fastify-plugin";
import type { Env } from "../config";
import type { LifecycleEventKind } from "../services/lifecycle-event-worker";

export interface LifecycleSubscriberOptions {
  config: Env;
}

async function lifecycleEventsSubscriber(
  fastify: FastifyInstance,
  options: LifecycleSubscriberOptions
) {
  const { config } = options;
  const { pubsub, lifecycleWorker } = fastify;
  const streams: Array<[LifecycleEventKind, string | undefined]> = [
    ["asset-registered", config.ASSET_REGISTERED_SUBSCRIPTION],
    ["asset-finalized", config.ASSET_FINALIZED_SUBSCRIPTION],
  ];
  const subscriptions: Subscription[] = [];

  for (const [kind, name] of streams) {
    if (!name) {
      fastify.log.info({ kind }, "No subscription configured; stream disabled");
      continue;
    }

    // One message in flight per stream.
    const subscription = pubsub.subscription(name, {
      flowControl: { maxMessages: 1, allowExcessMessages: false },
    });

    const onMessage = async (message: Message) => {
      const result = await lifecycleWorker.handleMessage(kind, {
        data: message.data,
        messageId: message.id,
        deliveryAttempt: message.deliveryAttempt,
      });
      if (result.action === "ack") {
        message.ack();
      } else {
        message.nack();
      }
    };

    subscription.on("message", (message: Message) => {
      onMessage(message).catch((error: unknown) => {
        fastify.log.error(
          { err: error, kind, messageId: message.id },
          "Lifecycle message handler crashed"
        );
        message.nack();
      });
    });
    subscription.on("error", (error: Error) => {
      fastify.log.error({ err: error, kind, subscription: name }, "Subscription error");
    });

    subscriptions.push(subscription);
    fastify.log.info({ kind, subscription: name }, "Listening for lifecycle events");
  }

  fastify.addHook("onClose", async () => {
    await Promise.all(subscriptions.map((subscription) => subscription.close()));
  });
}

export default fp(lifecycleEventsSubscriber, {
  name: "lifecycle-events-subscriber",
  dependencies: ["pubsub", "catalog"],
});
