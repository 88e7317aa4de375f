import { Storage } from "@google-cloud/storage";
import pino from "pino";
import { describe, expect, it, vi } from "vitest";
import { parseEnv } from "../config";
import {
  GcsObjectStore,
  InMemoryObjectStore,
  createObjectStore,
} from "./object-store";

const logger = pino({ level: "silent" });

describe("createObjectStore", () => {
  it("selects no store when storage is switched off", () => {
    const selection = createObjectStore(parseEnv({ STORAGE_BACKEND: "none" }), logger);

    expect(selection).toEqual({ store: null, reason: "STORAGE_BACKEND is none" });
  });

  it("refuses to start without a bucket unless catalog-only deletion is allowed", () => {
    expect(() =>
      createObjectStore(parseEnv({ STORAGE_BACKEND: "gcs" }), logger)
    ).toThrow("STORAGE_BUCKET is required for gcs backend");

    const degraded = createObjectStore(
      parseEnv({ STORAGE_BACKEND: "gcs", ALLOW_CATALOG_ONLY_DELETION: "true" }),
      logger
    );
    expect(degraded).toEqual({
      store: null,
      reason: "STORAGE_BUCKET is required for gcs backend",
    });
  });

  it("uses the in-process store for the memory backend and warns about it", () => {
    const warn = vi.spyOn(logger, "warn");

    const selection = createObjectStore(parseEnv({ STORAGE_BACKEND: "memory" }), logger);

    expect(selection.store).toBeInstanceOf(InMemoryObjectStore);
    expect(warn).toHaveBeenCalledWith(
      "Using the in-process object store; deletions never reach a real bucket"
    );
  });

  it("talks to the configured bucket when no backend is named", () => {
    const selection = createObjectStore(
      parseEnv({ NODE_ENV: "production", STORAGE_BUCKET: "prod-videos" }),
      logger
    );

    expect(selection.store).toBeInstanceOf(GcsObjectStore);
    expect(selection.store?.kind).toBe("gcs");
  });

  it("does not fall back to memory when the bucket is missing", () => {
    expect(() => createObjectStore(parseEnv({}), logger)).toThrow(
      "STORAGE_BUCKET is required for gcs backend"
    );
  });
});

describe("GcsObjectStore", () => {
  it("sends no request once the attempt signal has aborted", async () => {
    const bucket = new Storage({ projectId: "test-project" }).bucket("videos");
    const file = vi.spyOn(bucket, "file");
    const store = new GcsObjectStore(bucket, logger);
    const controller = new AbortController();
    controller.abort(new Error("attempt timed out"));

    await expect(store.deleteObject("raw/u1.mp4", controller.signal)).rejects.toThrow(
      "attempt timed out"
    );
    await expect(store.objectExists("raw/u1.mp4", controller.signal)).rejects.toThrow(
      "attempt timed out"
    );
    expect(file).not.toHaveBeenCalled();
  });
});

describe("InMemoryObjectStore", () => {
  it("pages through a prefix in name order", async () => {
    const store = new InMemoryObjectStore(["p/c", "p/a", "q/a", "p/b"]);

    const first = await store.listObjects("p/", { pageSize: 2 });
    const second = await store.listObjects("p/", {
      pageSize: 2,
      pageToken: first.nextPageToken,
    });

    expect(first).toEqual({ names: ["p/a", "p/b"], nextPageToken: "p/b" });
    expect(second).toEqual({ names: ["p/c"], nextPageToken: undefined });
  });
});
