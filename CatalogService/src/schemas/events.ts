import { z } from "zod";
import { normalizeTags } from "../utils/tags";
import { CatalogServiceError } from "../services/catalog-errors";

const text = z
  .string()
  .nullish()
  .transform((value) => value?.trim() ?? "");

const optionalText = z
  .string()
  .nullish()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

// Any other shape reads as no tags rather than failing the whole event.
const tags = z.unknown().transform((value) => normalizeTags(value));

const visibility = z
  .boolean()
  .nullish()
  .transform((value) => value ?? false);

const nullableNumber = z
  .number()
  .nullish()
  .transform((value) => value ?? null);

const nullableText = z
  .string()
  .nullish()
  .transform((value) => value ?? null);

export const mediaMetadataSchema = z.object({
  duration: nullableNumber,
  fileSize: nullableNumber,
  width: nullableNumber,
  height: nullableNumber,
  videoCodec: nullableText,
  videoBitrate: nullableNumber,
  audioCodec: nullableText,
  audioBitrate: nullableNumber,
  frameRate: nullableNumber,
});

export const assetRegisteredEventSchema = z.object({
  externalId: text,
  ownerId: text,
  ownerDisplayName: text,
  originalFilename: text,
  title: text,
  description: text,
  tags,
  isPrivate: visibility,
  category: text,
  rawObjectPath: text,
});

export const assetFinalizedEventSchema = z.object({
  externalId: text,
  ownerId: text,
  title: text,
  description: text,
  tags,
  category: text,
  isPrivate: visibility,
  originalFilename: text,
  rawObjectPath: text,
  manifestUrl: text,
  thumbnailUrl: text,
  // Absent leaves the stored block alone; an explicit null clears it.
  mediaMetadata: mediaMetadataSchema.nullish(),
});

export const lifecycleEventEnvelopeSchema = z
  .object({
    eventId: optionalText,
    eventType: optionalText,
  })
  .passthrough();

export type AssetRegisteredEvent = z.output<typeof assetRegisteredEventSchema>;
export type AssetFinalizedEvent = z.output<typeof assetFinalizedEventSchema>;

// Field names used by the upload and transcoding producers before the
// payloads were renamed; both spellings stay accepted on the wire.
const LEGACY_FIELD_ALIASES: ReadonlyArray<[legacy: string, current: string]> = [
  ["uploadId", "externalId"],
  ["userId", "ownerId"],
  ["username", "ownerDisplayName"],
  ["rawVideoPath", "rawObjectPath"],
  ["metadata", "mediaMetadata"],
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function withLegacyAliases(payload: unknown): unknown {
  if (!isRecord(payload)) {
    return payload;
  }
  const aliased: Record<string, unknown> = { ...payload };
  for (const [legacy, current] of LEGACY_FIELD_ALIASES) {
    if (aliased[current] === undefined && aliased[legacy] !== undefined) {
      aliased[current] = aliased[legacy];
    }
  }
  const hls = aliased.hls;
  if (
    aliased.manifestUrl === undefined &&
    isRecord(hls) &&
    typeof hls.masterUrl === "string"
  ) {
    aliased.manifestUrl = hls.masterUrl;
  }
  return aliased;
}

/**
 * Pub/Sub producers either publish the event fields at the top level or wrap
 * them as `{ eventId, eventType, data }`.
 */
export function unwrapEnvelope(payload: unknown): unknown {
  const envelope = lifecycleEventEnvelopeSchema.safeParse(payload);
  if (envelope.success && isRecord(envelope.data.data)) {
    return envelope.data.data;
  }
  return payload;
}

function describeIssues(error: z.ZodError) {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "payload"}: ${issue.message}`)
    .join("; ");
}

export function parseAssetRegisteredEvent(
  payload: unknown
): AssetRegisteredEvent {
  const result = assetRegisteredEventSchema.safeParse(
    withLegacyAliases(unwrapEnvelope(payload))
  );
  if (!result.success) {
    throw new CatalogServiceError(
      "INVALID_EVENT",
      `Malformed asset-registered event: ${describeIssues(result.error)}`
    );
  }
  return result.data;
}

export function parseAssetFinalizedEvent(
  payload: unknown
): AssetFinalizedEvent {
  const result = assetFinalizedEventSchema.safeParse(
    withLegacyAliases(unwrapEnvelope(payload))
  );
  if (!result.success) {
    throw new CatalogServiceError(
      "INVALID_EVENT",
      `Malformed asset-finalized event: ${describeIssues(result.error)}`
    );
  }
  return result.data;
}
