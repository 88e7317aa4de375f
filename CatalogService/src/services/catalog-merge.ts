import {
  PLACEHOLDER_TITLE,
  type AssetStatus,
  type CatalogFields,
} from "../types/catalog";

/**
 * How an incoming event value combines with the stored one.
 *
 * - `fill-if-empty`: written only while the stored value is empty or still
 *   the default, and only when the incoming value is not empty itself.
 * - `escalate-only`: booleans move from false to true, never back.
 * - `authoritative`: the incoming value replaces the stored one whenever the
 *   event carries it.
 */
export type FieldPolicy = "fill-if-empty" | "escalate-only" | "authoritative";

export type MergeableField = keyof CatalogFields;

export type MergePolicy = Partial<Record<MergeableField, FieldPolicy>>;

export interface MergeResult {
  fields: CatalogFields;
  changed: MergeableField[];
}

const MERGEABLE_FIELDS: readonly MergeableField[] = [
  "ownerId",
  "ownerDisplayName",
  "title",
  "description",
  "category",
  "tags",
  "isPrivate",
  "originalFilename",
  "rawObjectPath",
  "manifestUrl",
  "thumbnailUrl",
  "media",
];

const DESCRIPTIVE_FILL: MergePolicy = {
  ownerId: "fill-if-empty",
  ownerDisplayName: "fill-if-empty",
  title: "fill-if-empty",
  description: "fill-if-empty",
  category: "fill-if-empty",
  tags: "fill-if-empty",
  originalFilename: "fill-if-empty",
  rawObjectPath: "fill-if-empty",
  isPrivate: "escalate-only",
};

export const REGISTRATION_POLICY: MergePolicy = { ...DESCRIPTIVE_FILL };

export const FINALIZATION_POLICY: MergePolicy = {
  ...DESCRIPTIVE_FILL,
  thumbnailUrl: "fill-if-empty",
  manifestUrl: "authoritative",
  media: "authoritative",
};

export function isEmptyValue(field: MergeableField, value: unknown): boolean {
  if (value === null || value === undefined) {
    return true;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed === "" || (field === "title" && trimmed === PLACEHOLDER_TITLE);
  }
  if (Array.isArray(value)) {
    return value.length === 0;
  }
  return false;
}

function sameValue(left: unknown, right: unknown): boolean {
  if (left === right) {
    return true;
  }
  if (typeof left === "object" && typeof right === "object") {
    return JSON.stringify(left) === JSON.stringify(right);
  }
  return false;
}

function resolveField<K extends MergeableField>(
  field: K,
  policy: FieldPolicy,
  current: CatalogFields[K],
  incoming: CatalogFields[K] | undefined
): CatalogFields[K] {
  if (incoming === undefined) {
    return current;
  }
  switch (policy) {
    case "fill-if-empty":
      return isEmptyValue(field, current) && !isEmptyValue(field, incoming)
        ? incoming
        : current;
    case "escalate-only":
      return current === false && incoming === true ? incoming : current;
    case "authoritative":
      return incoming;
  }
}

/**
 * Applies `incoming` onto `existing` field by field. Neither input is
 * mutated; fields without a policy are left as they are.
 */
export function mergeFields(
  existing: CatalogFields,
  incoming: Partial<CatalogFields>,
  policy: MergePolicy
): MergeResult {
  const fields: CatalogFields = { ...existing, tags: [...existing.tags] };
  const changed: MergeableField[] = [];

  const apply = <K extends MergeableField>(field: K, fieldPolicy: FieldPolicy) => {
    const next = resolveField(field, fieldPolicy, existing[field], incoming[field]);
    if (!sameValue(next, existing[field])) {
      fields[field] = next;
      changed.push(field);
    }
  };

  for (const field of MERGEABLE_FIELDS) {
    const fieldPolicy = policy[field];
    if (fieldPolicy) {
      apply(field, fieldPolicy);
    }
  }

  return { fields, changed };
}

const STATUS_RANK: Record<AssetStatus, number> = {
  registered: 0,
  processing: 1,
  failed: 1,
  ready: 2,
};

/**
 * Status only moves forward. `ready` is terminal; `failed` may still be
 * superseded by a later successful finalization.
 */
export function advanceStatus(
  current: AssetStatus,
  next: AssetStatus
): AssetStatus {
  if (current === "ready") {
    return current;
  }
  return STATUS_RANK[next] >= STATUS_RANK[current] ? next : current;
}
