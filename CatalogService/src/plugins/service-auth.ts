import fp from "fastify-plugin";
import type { FastifyInstance } from "fastify";
import type { IncomingHttpHeaders } from "node:http";

const BEARER = /^Bearer\s+(\S+)\s*$/i;

/**
 * Producers and operators present the token either as a bearer credential or
 * in `x-service-token`; the bearer form wins when both are sent.
 */
export function readServiceToken(headers: IncomingHttpHeaders): string | undefined {
  const bearer = BEARER.exec(headers.authorization ?? "");
  if (bearer) {
    return bearer[1];
  }
  const header = headers["x-service-token"];
  const value = Array.isArray(header) ? header[0] : header;
  return value?.trim() || undefined;
}

export interface ServiceAuthPluginOptions {
  /** Unset disables the check, for local development. */
  token?: string;
  /** Only URLs under this prefix are guarded. */
  prefix: string;
}

const serviceAuthPlugin = fp(
  async function serviceAuthPlugin(
    fastify: FastifyInstance,
    options: ServiceAuthPluginOptions
  ) {
    const expected = options.token;
    if (!expected) {
      fastify.log.warn({ prefix: options.prefix }, "Service token unset; internal routes are open");
      return;
    }

    fastify.addHook("onRequest", async (request) => {
      if (!request.url.startsWith(options.prefix)) {
        return;
      }
      const presented = readServiceToken(request.headers);
      if (presented === undefined) {
        throw fastify.httpErrors.unauthorized("Missing service token");
      }
      if (presented !== expected) {
        throw fastify.httpErrors.forbidden("Invalid service token");
      }
    });
  },
  { name: "service-auth" }
);

export default serviceAuthPlugin;
