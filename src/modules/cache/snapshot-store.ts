import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { CacheError } from "./errors.js";
import type { CacheSnapshot } from "./result-cache.js";

const SNAPSHOT_VERSION = 1;

const embeddingSchema = z.object({
  model: z.string(),
  dimensions: z.number().int().nonnegative(),
  vector: z.array(z.number())
});

const articleSchema = z.object({
  id: z.string(),
  title: z.string(),
  authors: z.array(z.string()),
  journal: z.string(),
  publicationDate: z.string(),
  abstract: z.string(),
  url: z.string(),
  doi: z.string().optional()
});

const querySchema = z.object({
  text: z.string(),
  normalized: z.string(),
  filters: z
    .object({
      dateFrom: z.string().optional(),
      dateTo: z.string().optional(),
      journal: z.string().optional()
    })
    .optional()
});

const entrySchema = z.object({
  key: z.string(),
  query: querySchema,
  resultSet: z.object({
    query: querySchema,
    entries: z.array(z.object({ article: articleSchema, score: z.number() })),
    droppedRecordCount: z.number().int().nonnegative(),
    totalAvailable: z.number().int().nonnegative()
  }),
  embeddings: z.record(embeddingSchema),
  embeddingFailures: z.array(z.string()),
  findings: z.array(
    z.object({
      articleId: z.string(),
      claims: z.array(z.string()),
      available: z.boolean()
    })
  ),
  failedSummaryIds: z.array(z.string()),
  createdAt: z.number(),
  expiresAt: z.number()
});

const snapshotFileSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  savedAt: z.string(),
  entries: z.array(entrySchema),
  conversations: z.record(z.string())
});

export const resolveSnapshotPath = (configured: string): string =>
  path.isAbsolute(configured) ? configured : path.resolve(process.cwd(), configured);

/** JSON file persistence for {@link CacheSnapshot}s. */
export class CacheSnapshotStore {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = resolveSnapshotPath(filePath);
  }

  async save(snapshot: CacheSnapshot): Promise<void> {
    const payload = {
      version: SNAPSHOT_VERSION,
      savedAt: new Date().toISOString(),
      entries: snapshot.entries,
      conversations: snapshot.conversations
    };
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, JSON.stringify(payload), "utf8");
    } catch (error) {
      throw new CacheError("unavailable", `Could not write cache snapshot ${this.filePath}`, { cause: error });
    }
  }

  /** Missing file reads as an empty snapshot. */
  async load(): Promise<CacheSnapshot> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (error) {
      if (isMissingFileError(error)) {
        return { entries: [], conversations: {} };
      }
      throw new CacheError("unavailable", `Could not read cache snapshot ${this.filePath}`, { cause: error });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new CacheError("unavailable", `Cache snapshot ${this.filePath} is not valid JSON`, { cause: error });
    }

    const parsed = snapshotFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new CacheError("unavailable", `Cache snapshot ${this.filePath} has an unexpected shape`, {
        cause: parsed.error
      });
    }
    return { entries: parsed.data.entries, conversations: parsed.data.conversations };
  }
}

const isMissingFileError = (error: unknown): boolean =>
  typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
