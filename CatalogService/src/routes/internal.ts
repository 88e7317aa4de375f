import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { isCatalogServiceError } from "../services/catalog-errors";
import type { DeletionOutcome } from "../services/asset-deletion-service";
import type { ReconcileResult } from "../services/lifecycle-reconciler";

const assetIdParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

const externalIdParamsSchema = z.object({
  externalId: z.string().trim().min(1),
});

const deleteQuerySchema = z.object({
  timeoutMs: z.coerce.number().int().positive().max(600_000).optional(),
});

const DELETION_STATUS_CODES: Record<DeletionOutcome["status"], number> = {
  deleted: 200,
  partial: 200,
  not_found: 404,
  store_failure: 502,
  deadline_exceeded: 504,
};

function accepted(result: ReconcileResult) {
  return {
    recordId: result.record.id,
    externalId: result.record.externalId,
    status: result.record.status,
    created: result.created,
    changed: result.changed,
  };
}

export default async function internalRoutes(fastify: FastifyInstance) {
  const catalog = fastify.catalogService;

  const translateError = (error: unknown) => {
    if (isCatalogServiceError(error, "INVALID_EVENT")) {
      return fastify.httpErrors.badRequest(error.message);
    }
    if (isCatalogServiceError(error, "NOT_FOUND")) {
      return fastify.httpErrors.notFound(error.message);
    }
    if (isCatalogServiceError(error, "STORE_FAILURE")) {
      return fastify.httpErrors.serviceUnavailable("Catalog store unavailable");
    }
    return error;
  };

  fastify.post("/assets/registered", async (request, reply) => {
    try {
      const result = await catalog.registerAsset(request.body);
      return reply.status(202).send(accepted(result));
    } catch (error) {
      throw translateError(error);
    }
  });

  fastify.post("/assets/finalized", async (request, reply) => {
    try {
      const result = await catalog.finalizeAsset(request.body);
      return reply.status(202).send(accepted(result));
    } catch (error) {
      throw translateError(error);
    }
  });

  fastify.get("/assets/by-external-id/:externalId", {
    schema: {
      params: externalIdParamsSchema,
    },
    handler: async (request) => {
      const params = externalIdParamsSchema.parse(request.params);
      try {
        return await catalog.getAssetByExternalId(params.externalId);
      } catch (error) {
        throw translateError(error);
      }
    },
  });

  fastify.get("/assets/:id", {
    schema: {
      params: assetIdParamsSchema,
    },
    handler: async (request) => {
      const params = assetIdParamsSchema.parse(request.params);
      try {
        return await catalog.getAsset(params.id);
      } catch (error) {
        throw translateError(error);
      }
    },
  });

  fastify.delete("/assets/:id", {
    schema: {
      params: assetIdParamsSchema,
      querystring: deleteQuerySchema,
    },
    handler: async (request, reply) => {
      const params = assetIdParamsSchema.parse(request.params);
      const query = deleteQuerySchema.parse(request.query);
      const outcome = await catalog.deleteAssetCompletely(params.id, {
        timeoutMs: query.timeoutMs,
      });
      if (outcome.status !== "deleted" && outcome.status !== "partial") {
        request.log.warn(
          { recordId: params.id, outcome: outcome.status },
          "Asset deletion did not complete"
        );
      }
      return reply.status(DELETION_STATUS_CODES[outcome.status]).send(outcome);
    },
  });
}
