import fs from "fs";
import path from "path";
import crypto from "crypto";
import { z } from "zod";
import { logger } from "../utils/logger";
import {
  ItemSchema,
  RESULT_KINDS,
  toResultPayload,
  type CollectionResult,
  type ResultKind,
} from "./types";

export const CACHE_KEY_LENGTH = 12;

export interface CacheRef {
  kind: ResultKind;
  subject: string;
  key: string;
}

export interface CacheRequestParams {
  query: string;
  queryType?: string;
  limit: number;
  pageSize?: number;
  startCursor?: string | null;
}

const CacheMetadataSchema = z.object({
  kind: z.enum(["tweets", "followings", "followers"]),
  subject: z.string(),
  key: z.string(),
  query: z.string(),
  queryType: z.string().optional(),
  limit: z.number(),
  pageSize: z.number().optional(),
  startCursor: z.string().nullable().optional(),
  itemCount: z.number(),
  savedAt: z.string(),
});
export type CacheMetadata = z.infer<typeof CacheMetadataSchema>;

const CacheEntrySchema = z
  .object({
    metadata: CacheMetadataSchema,
    has_next_page: z.boolean(),
    next_cursor: z.string().nullable(),
    status: z.literal("success"),
    message: z.string(),
  })
  .passthrough();

export interface CacheEntrySummary extends CacheMetadata {
  path: string;
}

/**
 * Content-addressed key over the canonical query text and the limit: the same
 * text reuses an entry however it was built, different text never collides.
 */
export const deriveCacheKey = (queryText: string, limit: number): string =>
  crypto.createHash("sha256").update(`${queryText}|${limit}`).digest("hex").slice(0, CACHE_KEY_LENGTH);

export const normalizeSubject = (subject: string): string =>
  subject.replace(/^@/, "").toLowerCase().replace(/[^a-z0-9_]/g, "_") || "_";

export class CacheStore {
  readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir);
  }

  entryPath(ref: CacheRef): string {
    return path.join(this.rootDir, ref.kind, normalizeSubject(ref.subject), `${ref.key}.json`);
  }

  /** Always overwrites; request params are stored for inspection only. */
  save(ref: CacheRef, result: CollectionResult, params: CacheRequestParams): string {
    const file = this.entryPath(ref);
    const metadata: CacheMetadata = {
      kind: ref.kind,
      subject: normalizeSubject(ref.subject),
      key: ref.key,
      query: params.query,
      queryType: params.queryType,
      limit: params.limit,
      pageSize: params.pageSize,
      startCursor: params.startCursor ?? null,
      itemCount: result.items.length,
      savedAt: new Date().toISOString(),
    };
    const doc = { metadata, ...toResultPayload(result) };

    fs.mkdirSync(path.dirname(file), { recursive: true });
    const tmp = `${file}.${process.pid}.tmp`;
    fs.writeFileSync(tmp, JSON.stringify(doc, null, 2), "utf-8");
    fs.renameSync(tmp, file);
    logger.debug({ file, count: result.items.length }, "缓存已写入");
    return file;
  }

  /** Missing, unreadable or malformed entries are all a miss. */
  load(ref: CacheRef): CollectionResult | undefined {
    const file = this.entryPath(ref);
    if (!fs.existsSync(file)) return undefined;

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(file, "utf-8"));
    } catch (err) {
      logger.warn({ file, error: err instanceof Error ? err.message : String(err) }, "缓存文件无法解析，按未命中处理");
      return undefined;
    }

    const entry = CacheEntrySchema.safeParse(raw);
    const items = entry.success ? z.array(ItemSchema).safeParse(entry.data[ref.kind]) : undefined;
    if (!entry.success || !items?.success || entry.data.metadata.kind !== ref.kind) {
      logger.warn({ file }, "缓存文件结构无效，按未命中处理");
      return undefined;
    }

    return {
      kind: ref.kind,
      items: items.data,
      has_next_page: entry.data.has_next_page,
      next_cursor: entry.data.next_cursor,
      status: entry.data.status,
      message: entry.data.message,
    };
  }

  list(filter: { kind?: ResultKind; subject?: string } = {}): CacheEntrySummary[] {
    const summaries: CacheEntrySummary[] = [];
    for (const file of this.entryFiles(filter)) {
      try {
        const parsed = CacheEntrySchema.safeParse(JSON.parse(fs.readFileSync(file, "utf-8")));
        if (parsed.success) summaries.push({ ...parsed.data.metadata, path: file });
      } catch (err) {
        logger.warn({ file, error: err instanceof Error ? err.message : String(err) }, "跳过无法读取的缓存文件");
      }
    }
    return summaries.sort((a, b) => b.savedAt.localeCompare(a.savedAt));
  }

  /** Deletes every entry under the kind/subject filter and returns how many were removed. */
  clear(filter: { kind?: ResultKind; subject?: string } = {}): number {
    const files = this.entryFiles(filter);
    for (const file of files) fs.rmSync(file, { force: true });
    logger.info({ ...filter, removed: files.length }, "缓存已清理");
    return files.length;
  }

  private entryFiles(filter: { kind?: ResultKind; subject?: string }): string[] {
    const kinds = filter.kind ? [filter.kind] : RESULT_KINDS;
    const files: string[] = [];
    for (const kind of kinds) {
      const kindDir = path.join(this.rootDir, kind);
      if (!fs.existsSync(kindDir)) continue;
      const subjects = filter.subject ? [normalizeSubject(filter.subject)] : fs.readdirSync(kindDir);
      for (const subject of subjects) {
        const subjectDir = path.join(kindDir, subject);
        if (!fs.existsSync(subjectDir) || !fs.statSync(subjectDir).isDirectory()) continue;
        for (const name of fs.readdirSync(subjectDir)) {
          if (name.endsWith(".json")) files.push(path.join(subjectDir, name));
        }
      }
    }
    return files;
  }
}
