import { Pool } from "pg";
import pino, { type Logger } from "pino";
import { z } from "zod";
import type { Env } from "../config";
import { mediaMetadataSchema } from "../schemas/events";
import {
  ASSET_STATUSES,
  type CatalogRecord,
  type MediaMetadata,
  type NewCatalogRecord,
} from "../types/catalog";

/**
 * Operations that run inside one store transaction. A merge reads, creates
 * and saves through the same transaction so that concurrent deliveries for
 * one external id serialize on the row.
 */
export interface CatalogTransaction {
  findByExternalIdForUpdate(externalId: string): Promise<CatalogRecord | null>;
  /** Returns null when another writer already holds the external id. */
  createIfAbsent(record: NewCatalogRecord): Promise<CatalogRecord | null>;
  save(record: CatalogRecord): Promise<CatalogRecord>;
}

export interface CatalogRepository {
  findById(id: number): Promise<CatalogRecord | null>;
  findByExternalId(externalId: string): Promise<CatalogRecord | null>;
  /** Permanent removal; there is no soft-delete on this path. */
  deleteById(id: number): Promise<boolean>;
  transaction<T>(work: (tx: CatalogTransaction) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

export function createCatalogRepository(
  config: Env,
  logger?: Logger
): CatalogRepository {
  const scopedLogger = logger ?? pino({ name: "catalog-repo" });

  if (config.CATALOG_REPOSITORY_BACKEND === "postgres") {
    if (!config.DATABASE_URL) {
      throw new Error("DATABASE_URL is required for postgres backend");
    }
    return new PostgresCatalogRepository(
      new Pool({ connectionString: config.DATABASE_URL }),
      scopedLogger
    );
  }

  return new InMemoryCatalogRepository(scopedLogger);
}

const catalogRowSchema = z.object({
  id: z.number().int(),
  external_id: z.string(),
  owner_id: z.string(),
  owner_display_name: z.string(),
  title: z.string(),
  description: z.string(),
  category: z.string(),
  tags: z.array(z.string()).nullable(),
  is_private: z.boolean(),
  status: z.enum(ASSET_STATUSES),
  original_filename: z.string(),
  raw_object_path: z.string(),
  manifest_url: z.string(),
  thumbnail_url: z.string(),
  media: z.unknown(),
  created_at: z.date(),
  updated_at: z.date(),
});

const COLUMNS = `id, external_id, owner_id, owner_display_name, title, description, category, tags,
  is_private, status, original_filename, raw_object_path, manifest_url, thumbnail_url, media,
  created_at, updated_at`;

// Upper bound of the SERIAL id column.
const MAX_RECORD_ID = 2_147_483_647;

function parseMedia(value: unknown): MediaMetadata | null {
  if (value === null || value === undefined) {
    return null;
  }
  const raw: unknown = typeof value === "string" ? JSON.parse(value) : value;
  return mediaMetadataSchema.parse(raw);
}

function fromRow(value: unknown): CatalogRecord {
  const row = catalogRowSchema.parse(value);
  return {
    id: row.id,
    externalId: row.external_id,
    ownerId: row.owner_id,
    ownerDisplayName: row.owner_display_name,
    title: row.title,
    description: row.description,
    category: row.category,
    tags: row.tags ?? [],
    isPrivate: row.is_private,
    status: row.status,
    originalFilename: row.original_filename,
    rawObjectPath: row.raw_object_path,
    manifestUrl: row.manifest_url,
    thumbnailUrl: row.thumbnail_url,
    media: parseMedia(row.media),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function firstRecord(rows: unknown[]): CatalogRecord | null {
  return rows.length > 0 ? fromRow(rows[0]) : null;
}

function recordValues(record: NewCatalogRecord) {
  return [
    record.externalId,
    record.ownerId,
    record.ownerDisplayName,
    record.title,
    record.description,
    record.category,
    record.tags,
    record.isPrivate,
    record.status,
    record.originalFilename,
    record.rawObjectPath,
    record.manifestUrl,
    record.thumbnailUrl,
    record.media ? JSON.stringify(record.media) : null,
  ];
}

/**
 * The slice of `pg` the store talks to. `Pool` and `PoolClient` satisfy it,
 * and tests hand in scripted stand-ins.
 */
export interface SqlQueryable {
  query(
    text: string,
    values?: unknown[]
  ): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

export interface SqlConnection extends SqlQueryable {
  release(): void;
}

export interface SqlPool extends SqlQueryable {
  connect(): Promise<SqlConnection>;
  end(): Promise<void>;
}

class PostgresCatalogTransaction implements CatalogTransaction {
  constructor(private readonly client: SqlQueryable) {}

  async findByExternalIdForUpdate(
    externalId: string
  ): Promise<CatalogRecord | null> {
    const result = await this.client.query(
      `SELECT ${COLUMNS} FROM catalog_assets WHERE external_id = $1 FOR UPDATE`,
      [externalId]
    );
    return firstRecord(result.rows);
  }

  async createIfAbsent(record: NewCatalogRecord): Promise<CatalogRecord | null> {
    const result = await this.client.query(
      `INSERT INTO catalog_assets (
          external_id, owner_id, owner_display_name, title, description, category, tags,
          is_private, status, original_filename, raw_object_path, manifest_url, thumbnail_url, media
        ) VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12,$13,$14)
        ON CONFLICT (external_id) DO NOTHING
        RETURNING ${COLUMNS}`,
      recordValues(record)
    );
    return firstRecord(result.rows);
  }

  async save(record: CatalogRecord): Promise<CatalogRecord> {
    const result = await this.client.query(
      `UPDATE catalog_assets SET
          owner_id = $2,
          owner_display_name = $3,
          title = $4,
          description = $5,
          category = $6,
          tags = $7,
          is_private = $8,
          status = $9,
          original_filename = $10,
          raw_object_path = $11,
          manifest_url = $12,
          thumbnail_url = $13,
          media = $14,
          updated_at = now()
        WHERE id = $15 AND external_id = $1
        RETURNING ${COLUMNS}`,
      [...recordValues(record), record.id]
    );
    if (result.rows.length === 0) {
      throw new Error(`Catalog record ${record.id} vanished during save`);
    }
    return fromRow(result.rows[0]);
  }
}

export class PostgresCatalogRepository implements CatalogRepository {
  private readonly logger: Logger;
  private ready: Promise<void> | null = null;

  constructor(
    private readonly pool: SqlPool,
    logger: Logger
  ) {
    this.logger = logger.child({ store: "postgres" });
  }

  private async ensureReady() {
    if (!this.ready) {
      this.ready = this.createSchema().catch((error: unknown) => {
        this.ready = null;
        throw error;
      });
    }
    await this.ready;
  }

  private async createSchema() {
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS catalog_assets (
        id SERIAL PRIMARY KEY,
        external_id TEXT NOT NULL UNIQUE,
        owner_id TEXT NOT NULL DEFAULT '',
        owner_display_name TEXT NOT NULL DEFAULT '',
        title TEXT NOT NULL,
        description TEXT NOT NULL DEFAULT '',
        category TEXT NOT NULL DEFAULT '',
        tags TEXT[] NOT NULL DEFAULT '{}',
        is_private BOOLEAN NOT NULL DEFAULT FALSE,
        status TEXT NOT NULL,
        original_filename TEXT NOT NULL DEFAULT '',
        raw_object_path TEXT NOT NULL DEFAULT '',
        manifest_url TEXT NOT NULL DEFAULT '',
        thumbnail_url TEXT NOT NULL DEFAULT '',
        media JSONB,
        created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
      )
    `);
    await this.pool.query(
      "CREATE INDEX IF NOT EXISTS catalog_assets_owner_idx ON catalog_assets (owner_id)"
    );
    this.logger.debug("Catalog schema ready");
  }

  async findById(id: number): Promise<CatalogRecord | null> {
    if (id > MAX_RECORD_ID) {
      return null;
    }
    await this.ensureReady();
    const result = await this.pool.query(
      `SELECT ${COLUMNS} FROM catalog_assets WHERE id = $1`,
      [id]
    );
    return firstRecord(result.rows);
  }

  async findByExternalId(externalId: string): Promise<CatalogRecord | null> {
    await this.ensureReady();
    const result = await this.pool.query(
      `SELECT ${COLUMNS} FROM catalog_assets WHERE external_id = $1`,
      [externalId]
    );
    return firstRecord(result.rows);
  }

  async deleteById(id: number): Promise<boolean> {
    if (id > MAX_RECORD_ID) {
      return false;
    }
    await this.ensureReady();
    const result = await this.pool.query(
      "DELETE FROM catalog_assets WHERE id = $1",
      [id]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async transaction<T>(
    work: (tx: CatalogTransaction) => Promise<T>
  ): Promise<T> {
    await this.ensureReady();
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      const result = await work(new PostgresCatalogTransaction(client));
      await client.query("COMMIT");
      return result;
    } catch (error) {
      try {
        await client.query("ROLLBACK");
      } catch (rollbackError) {
        this.logger.error({ err: rollbackError }, "Rollback failed");
      }
      throw error;
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

function cloneRecord(record: CatalogRecord): CatalogRecord {
  return {
    ...record,
    tags: [...record.tags],
    media: record.media ? { ...record.media } : null,
    createdAt: new Date(record.createdAt),
    updatedAt: new Date(record.updatedAt),
  };
}

/**
 * Process-local store used for development and tests. Transactions run one
 * at a time and only publish their writes once the work resolves.
 */
export class InMemoryCatalogRepository implements CatalogRepository {
  private readonly records = new Map<number, CatalogRecord>();
  private readonly byExternalId = new Map<string, number>();
  private readonly logger: Logger;
  private nextId = 1;
  private lock: Promise<void> = Promise.resolve();

  constructor(logger?: Logger) {
    this.logger = (logger ?? pino({ name: "catalog-repo" })).child({
      store: "memory",
    });
  }

  async findById(id: number): Promise<CatalogRecord | null> {
    const record = this.records.get(id);
    return record ? cloneRecord(record) : null;
  }

  async findByExternalId(externalId: string): Promise<CatalogRecord | null> {
    const id = this.byExternalId.get(externalId);
    return id === undefined ? null : this.findById(id);
  }

  async deleteById(id: number): Promise<boolean> {
    return this.serialize(async () => {
      const record = this.records.get(id);
      if (!record) {
        return false;
      }
      this.records.delete(id);
      this.byExternalId.delete(record.externalId);
      return true;
    });
  }

  async transaction<T>(
    work: (tx: CatalogTransaction) => Promise<T>
  ): Promise<T> {
    return this.serialize(async () => {
      const staged = new Map<number, CatalogRecord>();
      const stagedExternal = new Map<string, number>();

      const lookup = (externalId: string) => {
        const id = stagedExternal.get(externalId) ?? this.byExternalId.get(externalId);
        if (id === undefined) {
          return null;
        }
        const record = staged.get(id) ?? this.records.get(id);
        return record ? cloneRecord(record) : null;
      };

      const tx: CatalogTransaction = {
        findByExternalIdForUpdate: async (externalId) => lookup(externalId),
        createIfAbsent: async (draft) => {
          if (lookup(draft.externalId)) {
            return null;
          }
          const now = new Date();
          const record: CatalogRecord = {
            ...draft,
            tags: [...draft.tags],
            id: this.nextId++,
            createdAt: now,
            updatedAt: now,
          };
          staged.set(record.id, record);
          stagedExternal.set(record.externalId, record.id);
          return cloneRecord(record);
        },
        save: async (record) => {
          if (!staged.has(record.id) && !this.records.has(record.id)) {
            throw new Error(`Catalog record ${record.id} vanished during save`);
          }
          const saved = cloneRecord({ ...record, updatedAt: new Date() });
          staged.set(saved.id, saved);
          return cloneRecord(saved);
        },
      };

      const result = await work(tx);
      for (const [id, record] of staged) {
        this.records.set(id, record);
        this.byExternalId.set(record.externalId, id);
      }
      if (staged.size > 0) {
        this.logger.debug({ records: staged.size }, "Committed catalog writes");
      }
      return result;
    });
  }

  async close(): Promise<void> {
    this.records.clear();
    this.byExternalId.clear();
  }

  private serialize<T>(operation: () => Promise<T>): Promise<T> {
    const run = this.lock.then(operation);
    this.lock = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
