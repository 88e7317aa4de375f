import { describe, expect, it } from "vitest";
import { emptyCatalogFields, type CatalogFields } from "../types/catalog";
import {
  FINALIZATION_POLICY,
  REGISTRATION_POLICY,
  advanceStatus,
  isEmptyValue,
  mergeFields,
} from "./catalog-merge";

function fields(overrides: Partial<CatalogFields> = {}): CatalogFields {
  return { ...emptyCatalogFields(), ...overrides };
}

const media = {
  duration: 12.5,
  fileSize: 1024,
  width: 1280,
  height: 720,
  videoCodec: "h264",
  videoBitrate: 2_000_000,
  audioCodec: "aac",
  audioBitrate: 128_000,
  frameRate: 30,
};

describe("isEmptyValue", () => {
  it("treats the placeholder title as empty only for the title", () => {
    expect(isEmptyValue("title", "Untitled Video")).toBe(true);
    expect(isEmptyValue("title", "  Untitled Video ")).toBe(true);
    expect(isEmptyValue("description", "Untitled Video")).toBe(false);
  });

  it("treats blanks, nulls and empty lists as empty", () => {
    expect(isEmptyValue("description", "   ")).toBe(true);
    expect(isEmptyValue("media", null)).toBe(true);
    expect(isEmptyValue("tags", [])).toBe(true);
    expect(isEmptyValue("tags", ["a"])).toBe(false);
    expect(isEmptyValue("isPrivate", false)).toBe(false);
  });
});

describe("mergeFields", () => {
  it("fills the placeholder title", () => {
    const result = mergeFields(fields(), { title: "Cats" }, REGISTRATION_POLICY);

    expect(result.fields.title).toBe("Cats");
    expect(result.changed).toEqual(["title"]);
  });

  it("keeps a real title over a later one", () => {
    const result = mergeFields(
      fields({ title: "Cats" }),
      { title: "Dogs" },
      FINALIZATION_POLICY
    );

    expect(result.fields.title).toBe("Cats");
    expect(result.changed).toEqual([]);
  });

  it("never writes an empty incoming value over a stored one", () => {
    const result = mergeFields(
      fields({ description: "d", tags: ["a"] }),
      { description: "", tags: [] },
      REGISTRATION_POLICY
    );

    expect(result.fields.description).toBe("d");
    expect(result.fields.tags).toEqual(["a"]);
    expect(result.changed).toEqual([]);
  });

  it("only escalates visibility", () => {
    const raised = mergeFields(fields(), { isPrivate: true }, REGISTRATION_POLICY);
    const lowered = mergeFields(
      fields({ isPrivate: true }),
      { isPrivate: false },
      REGISTRATION_POLICY
    );

    expect(raised.fields.isPrivate).toBe(true);
    expect(raised.changed).toEqual(["isPrivate"]);
    expect(lowered.fields.isPrivate).toBe(true);
    expect(lowered.changed).toEqual([]);
  });

  it("replaces the manifest and media on finalization", () => {
    const result = mergeFields(
      fields({ manifestUrl: "https://x/old.m3u8", media: { ...media, duration: 3 } }),
      { manifestUrl: "https://x/new.m3u8", media },
      FINALIZATION_POLICY
    );

    expect(result.fields.manifestUrl).toBe("https://x/new.m3u8");
    expect(result.fields.media).toEqual(media);
    expect(result.changed).toEqual(["manifestUrl", "media"]);
  });

  it("keeps the stored media when the event does not carry any", () => {
    const result = mergeFields(
      fields({ media }),
      { manifestUrl: "https://x/m.m3u8" },
      FINALIZATION_POLICY
    );

    expect(result.fields.media).toEqual(media);
  });

  it("ignores fields the policy does not name", () => {
    const result = mergeFields(
      fields(),
      { manifestUrl: "https://x/m.m3u8", thumbnailUrl: "https://x/t.jpg" },
      REGISTRATION_POLICY
    );

    expect(result.fields.manifestUrl).toBe("");
    expect(result.fields.thumbnailUrl).toBe("");
    expect(result.changed).toEqual([]);
  });

  it("does not mutate its inputs", () => {
    const existing = fields({ tags: ["a"] });
    const incoming: Partial<CatalogFields> = { title: "Cats" };

    const result = mergeFields(existing, incoming, REGISTRATION_POLICY);
    result.fields.tags.push("b");

    expect(existing.title).toBe("Untitled Video");
    expect(existing.tags).toEqual(["a"]);
  });
});

describe("advanceStatus", () => {
  it("moves forward", () => {
    expect(advanceStatus("registered", "processing")).toBe("processing");
    expect(advanceStatus("processing", "ready")).toBe("ready");
    expect(advanceStatus("failed", "ready")).toBe("ready");
  });

  it("never leaves ready and never moves back", () => {
    expect(advanceStatus("ready", "failed")).toBe("ready");
    expect(advanceStatus("ready", "registered")).toBe("ready");
    expect(advanceStatus("processing", "registered")).toBe("processing");
  });
});
