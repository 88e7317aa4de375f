import type { CatalogRecord } from "../types/catalog";

const RENDITION_MARKER = "hls";

export interface DeletionPlan {
  /** Single objects, each checked for existence before it is deleted. */
  objects: string[];
  /** Folders removed through a paginated listing; every entry ends in "/". */
  prefixes: string[];
}

function asFolder(prefix: string) {
  return prefix.endsWith("/") ? prefix : `${prefix}/`;
}

function pathSegments(location: string): string[] {
  try {
    return new URL(location).pathname.split("/");
  } catch {
    return location.split("/");
  }
}

/**
 * Rendition folder of an asset: the `hls` segment of the manifest location
 * followed by the next two segments. Falls back to `hls/{owner}/{externalId}`
 * when the location does not contain one.
 */
export function extractRenditionPrefix(
  manifestUrl: string,
  ownerId: string,
  externalId: string
): string {
  const segments = pathSegments(manifestUrl);
  const index = segments.indexOf(RENDITION_MARKER);
  if (index >= 0 && index + 2 < segments.length) {
    const first = segments[index + 1];
    const second = segments[index + 2];
    if (first && second) {
      return asFolder(`${RENDITION_MARKER}/${first}/${second}`);
    }
  }
  return asFolder(`${RENDITION_MARKER}/${ownerId}/${externalId}`);
}

export function buildDeletionPlan(
  record: Pick<
    CatalogRecord,
    "ownerId" | "externalId" | "rawObjectPath" | "manifestUrl"
  >
): DeletionPlan {
  const objects: string[] = [];
  const prefixes: string[] = [];

  if (record.rawObjectPath) {
    objects.push(record.rawObjectPath);
  }
  objects.push(`thumbnails/${record.ownerId}/${record.externalId}.jpg`);

  if (record.manifestUrl) {
    prefixes.push(
      extractRenditionPrefix(record.manifestUrl, record.ownerId, record.externalId)
    );
  }
  prefixes.push(asFolder(`videos/${record.ownerId}/${record.externalId}`));

  return { objects, prefixes };
}
