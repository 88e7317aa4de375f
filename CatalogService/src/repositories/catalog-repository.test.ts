import pino from "pino";
import { describe, expect, it, vi } from "vitest";
import { emptyCatalogFields, type NewCatalogRecord } from "../types/catalog";
import {
  InMemoryCatalogRepository,
  PostgresCatalogRepository,
  type SqlConnection,
  type SqlPool,
} from "./catalog-repository";

const logger = pino({ level: "silent" });

function draft(externalId: string): NewCatalogRecord {
  return { ...emptyCatalogFields(), externalId, status: "processing" };
}

describe("InMemoryCatalogRepository", () => {
  it("assigns increasing ids and finds records both ways", async () => {
    const repository = new InMemoryCatalogRepository(logger);

    const first = await repository.transaction((tx) => tx.createIfAbsent(draft("u1")));
    const second = await repository.transaction((tx) => tx.createIfAbsent(draft("u2")));

    expect(first?.id).toBe(1);
    expect(second?.id).toBe(2);
    expect((await repository.findByExternalId("u2"))?.id).toBe(2);
    expect((await repository.findById(1))?.externalId).toBe("u1");
  });

  it("refuses a second record for the same external id", async () => {
    const repository = new InMemoryCatalogRepository(logger);
    await repository.transaction((tx) => tx.createIfAbsent(draft("u1")));

    const duplicate = await repository.transaction((tx) =>
      tx.createIfAbsent(draft("u1"))
    );

    expect(duplicate).toBeNull();
  });

  it("discards the writes of a failed transaction", async () => {
    const repository = new InMemoryCatalogRepository(logger);

    await expect(
      repository.transaction(async (tx) => {
        await tx.createIfAbsent(draft("u1"));
        throw new Error("merge failed");
      })
    ).rejects.toThrow("merge failed");

    expect(await repository.findByExternalId("u1")).toBeNull();
  });

  it("hands out copies that do not alias the stored record", async () => {
    const repository = new InMemoryCatalogRepository(logger);
    await repository.transaction((tx) => tx.createIfAbsent(draft("u1")));

    const copy = await repository.findByExternalId("u1");
    copy?.tags.push("leaked");

    expect((await repository.findByExternalId("u1"))?.tags).toEqual([]);
  });

  it("saves changes and deletes rows for good", async () => {
    const repository = new InMemoryCatalogRepository(logger);
    const created = await repository.transaction((tx) => tx.createIfAbsent(draft("u1")));
    if (!created) {
      throw new Error("record was not created");
    }

    await repository.transaction((tx) => tx.save({ ...created, title: "Cats" }));
    expect((await repository.findById(created.id))?.title).toBe("Cats");

    expect(await repository.deleteById(created.id)).toBe(true);
    expect(await repository.deleteById(created.id)).toBe(false);
    expect(await repository.findByExternalId("u1")).toBeNull();
  });

  it("runs concurrent transactions one after another", async () => {
    const repository = new InMemoryCatalogRepository(logger);

    const results = await Promise.all([
      repository.transaction((tx) => tx.createIfAbsent(draft("u1"))),
      repository.transaction((tx) => tx.createIfAbsent(draft("u1"))),
    ]);

    expect(results.filter((record) => record !== null)).toHaveLength(1);
  });
});

type ScriptedResult = { rows: unknown[]; rowCount: number | null };

const stamp = new Date("2024-05-01T10:00:00Z");

function catalogRow(overrides: Record<string, unknown> = {}) {
  return {
    id: 7,
    external_id: "u1",
    owner_id: "user123",
    owner_display_name: "Ana",
    title: "My Clip",
    description: "",
    category: "music",
    tags: ["a", "b"],
    is_private: false,
    status: "ready",
    original_filename: "clip.mp4",
    raw_object_path: "raw/user123/u1.mp4",
    manifest_url: "https://x/hls/user123/u1/master.m3u8",
    thumbnail_url: "",
    media: { duration: 12.5 },
    created_at: stamp,
    updated_at: stamp,
    ...overrides,
  };
}

function rows(...values: unknown[]): ScriptedResult {
  return { rows: values, rowCount: values.length };
}

/**
 * Pool and connection share one scripted `query`; `statements` records the
 * leading keyword of every statement in the order the store issued them.
 */
function scriptedPool(
  respond: (keyword: string, values?: unknown[]) => ScriptedResult = () => rows()
) {
  const statements: string[] = [];
  const query = vi.fn(async (text: string, values?: unknown[]) => {
    const keyword = text.trim().split(/\s+/)[0] ?? "";
    statements.push(keyword);
    return respond(keyword, values);
  });
  const release = vi.fn();
  const connection: SqlConnection = { query, release };
  const pool: SqlPool = {
    query,
    connect: vi.fn(async () => connection),
    end: vi.fn(async () => undefined),
  };
  return { pool, query, release, statements };
}

describe("PostgresCatalogRepository", () => {
  it("creates the schema once and maps a row onto a record", async () => {
    const { pool, statements } = scriptedPool((keyword) =>
      keyword === "SELECT" ? rows(catalogRow()) : rows()
    );
    const repository = new PostgresCatalogRepository(pool, logger);

    const record = await repository.findById(7);
    await repository.findByExternalId("u1");

    expect(statements).toEqual(["CREATE", "CREATE", "SELECT", "SELECT"]);
    expect(record).toEqual({
      id: 7,
      externalId: "u1",
      ownerId: "user123",
      ownerDisplayName: "Ana",
      title: "My Clip",
      description: "",
      category: "music",
      tags: ["a", "b"],
      isPrivate: false,
      status: "ready",
      originalFilename: "clip.mp4",
      rawObjectPath: "raw/user123/u1.mp4",
      manifestUrl: "https://x/hls/user123/u1/master.m3u8",
      thumbnailUrl: "",
      media: {
        duration: 12.5,
        fileSize: null,
        width: null,
        height: null,
        videoCodec: null,
        videoBitrate: null,
        audioCodec: null,
        audioBitrate: null,
        frameRate: null,
      },
      createdAt: stamp,
      updatedAt: stamp,
    });
  });

  it("reads null tags as empty and media stored as JSON text", async () => {
    const { pool } = scriptedPool((keyword) =>
      keyword === "SELECT"
        ? rows(catalogRow({ tags: null, media: '{"width":1280,"videoCodec":"h264"}' }))
        : rows()
    );
    const repository = new PostgresCatalogRepository(pool, logger);

    const record = await repository.findByExternalId("u1");

    expect(record?.tags).toEqual([]);
    expect(record?.media).toMatchObject({ width: 1280, videoCodec: "h264", duration: null });
  });

  it("rejects a row carrying an unknown status", async () => {
    const { pool } = scriptedPool((keyword) =>
      keyword === "SELECT" ? rows(catalogRow({ status: "archived" })) : rows()
    );
    const repository = new PostgresCatalogRepository(pool, logger);

    await expect(repository.findById(7)).rejects.toThrow(/status/);
  });

  it("retries schema creation after a failed first attempt", async () => {
    let failCreate = true;
    const { pool, statements } = scriptedPool((keyword) => {
      if (keyword === "CREATE" && failCreate) {
        failCreate = false;
        throw new Error("connection refused");
      }
      return rows();
    });
    const repository = new PostgresCatalogRepository(pool, logger);

    await expect(repository.findById(1)).rejects.toThrow("connection refused");
    expect(await repository.findById(1)).toBeNull();
    expect(statements).toEqual(["CREATE", "CREATE", "CREATE", "SELECT"]);
  });

  it("answers ids beyond the id column's range without querying", async () => {
    const { pool, query } = scriptedPool();
    const repository = new PostgresCatalogRepository(pool, logger);

    expect(await repository.findById(2_147_483_648)).toBeNull();
    expect(await repository.deleteById(2_147_483_648)).toBe(false);
    expect(query).not.toHaveBeenCalled();
  });

  it("reports whether a delete removed a row", async () => {
    let removed = 1;
    const { pool } = scriptedPool((keyword) =>
      keyword === "DELETE" ? { rows: [], rowCount: removed-- } : rows()
    );
    const repository = new PostgresCatalogRepository(pool, logger);

    expect(await repository.deleteById(7)).toBe(true);
    expect(await repository.deleteById(7)).toBe(false);
  });

  it("runs a merge inside BEGIN and COMMIT on one connection", async () => {
    const inserted: unknown[][] = [];
    const { pool, release, statements } = scriptedPool((keyword, values) => {
      if (keyword === "INSERT") {
        inserted.push(values ?? []);
        return rows(catalogRow({ status: "processing", media: null }));
      }
      return rows();
    });
    const repository = new PostgresCatalogRepository(pool, logger);

    const created = await repository.transaction(async (tx) => {
      expect(await tx.findByExternalIdForUpdate("u1")).toBeNull();
      return tx.createIfAbsent({ ...draft("u1"), ownerId: "user123", tags: ["a"] });
    });

    expect(statements).toEqual(["CREATE", "CREATE", "BEGIN", "SELECT", "INSERT", "COMMIT"]);
    expect(release).toHaveBeenCalledTimes(1);
    expect(created).toMatchObject({ id: 7, status: "processing", media: null });
    expect(inserted[0]?.slice(0, 2)).toEqual(["u1", "user123"]);
    expect(inserted[0]?.[6]).toEqual(["a"]);
    expect(inserted[0]?.[13]).toBeNull();
  });

  it("yields null when the insert loses to a concurrent writer", async () => {
    const { pool } = scriptedPool();
    const repository = new PostgresCatalogRepository(pool, logger);

    const created = await repository.transaction((tx) => tx.createIfAbsent(draft("u1")));

    expect(created).toBeNull();
  });

  it("rolls back and releases the connection when the work fails", async () => {
    const { pool, release, statements } = scriptedPool();
    const repository = new PostgresCatalogRepository(pool, logger);

    await expect(
      repository.transaction(async () => {
        throw new Error("merge failed");
      })
    ).rejects.toThrow("merge failed");

    expect(statements.slice(2)).toEqual(["BEGIN", "ROLLBACK"]);
    expect(release).toHaveBeenCalledTimes(1);
  });

  it("fails a save whose row has disappeared", async () => {
    const { pool, release, statements } = scriptedPool();
    const repository = new PostgresCatalogRepository(pool, logger);

    await expect(
      repository.transaction((tx) =>
        tx.save({ ...draft("u1"), id: 7, createdAt: stamp, updatedAt: stamp })
      )
    ).rejects.toThrow("Catalog record 7 vanished during save");

    expect(statements.slice(2)).toEqual(["BEGIN", "UPDATE", "ROLLBACK"]);
    expect(release).toHaveBeenCalledTimes(1);
  });

  it("keeps the original error when the rollback itself fails", async () => {
    const { pool, release } = scriptedPool((keyword) => {
      if (keyword === "ROLLBACK") {
        throw new Error("socket closed");
      }
      return rows();
    });
    const repository = new PostgresCatalogRepository(pool, logger);

    await expect(
      repository.transaction(async () => {
        throw new Error("merge failed");
      })
    ).rejects.toThrow("merge failed");

    expect(release).toHaveBeenCalledTimes(1);
  });

  it("ends the pool on close", async () => {
    const { pool } = scriptedPool();
    const repository = new PostgresCatalogRepository(pool, logger);

    await repository.close();

    expect(pool.end).toHaveBeenCalledTimes(1);
  });
});
