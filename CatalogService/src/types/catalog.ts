export const ASSET_STATUSES = [
  "registered",
  "processing",
  "ready",
  "failed",
] as const;

export type AssetStatus = (typeof ASSET_STATUSES)[number];

export const PLACEHOLDER_TITLE = "Untitled Video";

export interface MediaMetadata {
  duration: number | null;
  fileSize: number | null;
  width: number | null;
  height: number | null;
  videoCodec: string | null;
  videoBitrate: number | null;
  audioCodec: string | null;
  audioBitrate: number | null;
  frameRate: number | null;
}

/**
 * Fields the lifecycle events are allowed to write. Identity (`id`,
 * `externalId`), `status` and timestamps are managed by the reconciler.
 */
export interface CatalogFields {
  ownerId: string;
  ownerDisplayName: string;
  title: string;
  description: string;
  category: string;
  tags: string[];
  isPrivate: boolean;
  originalFilename: string;
  rawObjectPath: string;
  manifestUrl: string;
  thumbnailUrl: string;
  media: MediaMetadata | null;
}

export interface CatalogRecord extends CatalogFields {
  id: number;
  externalId: string;
  status: AssetStatus;
  createdAt: Date;
  updatedAt: Date;
}

export type NewCatalogRecord = Omit<
  CatalogRecord,
  "id" | "createdAt" | "updatedAt"
>;

export function emptyCatalogFields(): CatalogFields {
  return {
    ownerId: "",
    ownerDisplayName: "",
    title: PLACEHOLDER_TITLE,
    description: "",
    category: "",
    tags: [],
    isPrivate: false,
    originalFilename: "",
    rawObjectPath: "",
    manifestUrl: "",
    thumbnailUrl: "",
    media: null,
  };
}
