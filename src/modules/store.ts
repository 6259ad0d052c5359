/**
 * Metadata Store
 * SQLite persistence for image records, categories, cursors, runs and errors.
 * Acquisition mutates the store only through commit, recordError and
 * advanceCursor (plus run bookkeeping); repair deletes through deleteImage.
 */

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import Database from "better-sqlite3";
import { PersistenceError, errorMessage } from "../errors";
import type {
  CategorySummary,
  DownloadUrlRow,
  ErrorLogEntry,
  FetchCursor,
  ImageDetail,
  ImageRecord,
  ImageUrl,
  RunState,
  StoreStats,
  TableSummary,
  UrlType,
} from "../types";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const DEFAULT_MIGRATIONS_DIR = path.resolve(__dirname, "../migrations");

export const REQUIRED_TABLES = [
  "images",
  "categories",
  "image_categories",
  "image_urls",
  "error_logs",
  "runs",
  "fetch_cursors",
  "download_stats",
] as const;

// -----------------------------------------------------------------------------
// Row shapes
// -----------------------------------------------------------------------------

interface ImageRow {
  id: string;
  file_path: string;
  width: number;
  height: number;
  color: string | null;
  author_name: string | null;
  author_username: string | null;
  description: string | null;
  link: string | null;
  created_at: string | null;
  downloaded_at: string;
  file_size: number;
  checksum: string;
  run_id: number;
}

interface ErrorRow {
  image_id: string | null;
  phase: ErrorLogEntry["phase"];
  error_class: string;
  message: string;
  url: string | null;
  retry_count: number;
  run_id: number | null;
  created_at: string;
}

interface CursorRow {
  stream: string;
  page: number;
  run_id: number;
  exhausted: number;
}

interface UrlRow {
  image_id: string;
  url_type: UrlType;
  url: string;
  recorded_at: string;
}

function toRow(record: ImageRecord): ImageRow {
  return {
    id: record.id,
    file_path: record.filePath,
    width: record.width,
    height: record.height,
    color: record.color,
    author_name: record.authorName,
    author_username: record.authorUsername,
    description: record.description,
    link: record.link,
    created_at: record.createdAt,
    downloaded_at: record.downloadedAt,
    file_size: record.fileSize,
    checksum: record.checksum,
    run_id: record.runId,
  };
}

function toRecord(row: ImageRow): ImageRecord {
  return {
    id: row.id,
    filePath: row.file_path,
    width: row.width,
    height: row.height,
    color: row.color,
    authorName: row.author_name,
    authorUsername: row.author_username,
    description: row.description,
    link: row.link,
    createdAt: row.created_at,
    downloadedAt: row.downloaded_at,
    fileSize: row.file_size,
    checksum: row.checksum,
    runId: row.run_id,
  };
}

function toErrorEntry(row: ErrorRow): ErrorLogEntry {
  return {
    imageId: row.image_id,
    phase: row.phase,
    errorClass: row.error_class,
    message: row.message,
    url: row.url,
    retryCount: row.retry_count,
    runId: row.run_id,
    createdAt: row.created_at,
  };
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (c) => `\\${c}`);
}

// -----------------------------------------------------------------------------
// Prepared Statements
// -----------------------------------------------------------------------------

function prepareStatements(db: Database.Database) {
  return {
    insertImage: db.prepare<ImageRow>(`
      INSERT INTO images (
        id, file_path, width, height, color, author_name, author_username,
        description, link, created_at, downloaded_at, file_size, checksum, run_id
      ) VALUES (
        @id, @file_path, @width, @height, @color, @author_name, @author_username,
        @description, @link, @created_at, @downloaded_at, @file_size, @checksum, @run_id
      )
    `),
    upsertCategory: db.prepare<[string, string]>(`
      INSERT INTO categories (name, created_at) VALUES (?, ?)
      ON CONFLICT(name) DO NOTHING
    `),
    getCategoryId: db.prepare<[string], { id: number }>(
      "SELECT id FROM categories WHERE name = ?",
    ),
    linkCategory: db.prepare<[string, number]>(
      "INSERT OR IGNORE INTO image_categories (image_id, category_id) VALUES (?, ?)",
    ),
    insertUrl: db.prepare<[string, UrlType, string, string]>(
      "INSERT INTO image_urls (image_id, url_type, url, recorded_at) VALUES (?, ?, ?, ?)",
    ),
    bumpDownloaded: db.prepare<[string, number]>(`
      INSERT INTO download_stats (date, downloaded, failed, bytes) VALUES (?, 1, 0, ?)
      ON CONFLICT(date) DO UPDATE SET
        downloaded = downloaded + 1,
        bytes = bytes + excluded.bytes
    `),
    bumpFailed: db.prepare<[string]>(`
      INSERT INTO download_stats (date, downloaded, failed, bytes) VALUES (?, 0, 1, 0)
      ON CONFLICT(date) DO UPDATE SET failed = failed + 1
    `),
    insertError: db.prepare<ErrorRow>(`
      INSERT INTO error_logs (
        image_id, phase, error_class, message, url, retry_count, run_id, created_at
      ) VALUES (
        @image_id, @phase, @error_class, @message, @url, @retry_count, @run_id, @created_at
      )
    `),
    upsertCursor: db.prepare<CursorRow & { updated_at: string }>(`
      INSERT INTO fetch_cursors (stream, page, run_id, exhausted, updated_at)
      VALUES (@stream, @page, @run_id, @exhausted, @updated_at)
      ON CONFLICT(stream) DO UPDATE SET
        page = excluded.page,
        run_id = excluded.run_id,
        exhausted = excluded.exhausted,
        updated_at = excluded.updated_at
    `),
    getCursor: db.prepare<[string], CursorRow>(
      "SELECT stream, page, run_id, exhausted FROM fetch_cursors WHERE stream = ?",
    ),
    insertRun: db.prepare<[string, string]>(
      "INSERT INTO runs (stream, started_at) VALUES (?, ?)",
    ),
    finishRun: db.prepare<[string, RunState, string, number]>(
      "UPDATE runs SET finished_at = ?, state = ?, reason = ? WHERE id = ?",
    ),
    lastRuns: db.prepare<[], { stream: string; id: number }>(
      "SELECT stream, MAX(id) AS id FROM runs GROUP BY stream",
    ),
    getImage: db.prepare<[string], ImageRow>("SELECT * FROM images WHERE id = ?"),
    fileOwner: db.prepare<[string], { id: string }>(
      "SELECT id FROM images WHERE file_path = ? COLLATE NOCASE ORDER BY id LIMIT 1",
    ),
    allImages: db.prepare<[], ImageRow>("SELECT * FROM images ORDER BY id"),
    allImageIds: db.prepare<[], { id: string }>("SELECT id FROM images"),
    imageCategories: db.prepare<[string], { name: string }>(`
      SELECT c.name FROM categories c
      JOIN image_categories ic ON ic.category_id = c.id
      WHERE ic.image_id = ?
      ORDER BY c.name
    `),
    imageUrls: db.prepare<[string], UrlRow>(
      "SELECT image_id, url_type, url, recorded_at FROM image_urls WHERE image_id = ? ORDER BY id",
    ),
    recentUrls: db.prepare<[number], UrlRow>(
      "SELECT image_id, url_type, url, recorded_at FROM image_urls ORDER BY id DESC LIMIT ?",
    ),
    deleteImageCategories: db.prepare<[string]>(
      "DELETE FROM image_categories WHERE image_id = ?",
    ),
    deleteImageUrls: db.prepare<[string]>("DELETE FROM image_urls WHERE image_id = ?"),
    deleteImage: db.prepare<[string]>("DELETE FROM images WHERE id = ?"),
    search: db.prepare<{ pattern: string; limit: number }, ImageRow>(`
      SELECT DISTINCT i.* FROM images i
      LEFT JOIN image_categories ic ON ic.image_id = i.id
      LEFT JOIN categories c ON c.id = ic.category_id
      WHERE i.description LIKE @pattern ESCAPE '\\'
         OR i.author_name LIKE @pattern ESCAPE '\\'
         OR i.author_username LIKE @pattern ESCAPE '\\'
         OR c.name LIKE @pattern ESCAPE '\\'
      ORDER BY i.downloaded_at DESC, i.id
      LIMIT @limit
    `),
    byCategory: db.prepare<[string, number], ImageRow>(`
      SELECT i.* FROM images i
      JOIN image_categories ic ON ic.image_id = i.id
      JOIN categories c ON c.id = ic.category_id
      WHERE c.name = ?
      ORDER BY i.downloaded_at DESC, i.id
      LIMIT ?
    `),
    categories: db.prepare<[], CategorySummary>(`
      SELECT c.name AS name, COUNT(ic.image_id) AS count
      FROM categories c
      LEFT JOIN image_categories ic ON ic.category_id = c.id
      GROUP BY c.id
      ORDER BY count DESC, c.name
    `),
    recentErrors: db.prepare<[number], ErrorRow>(`
      SELECT image_id, phase, error_class, message, url, retry_count, run_id, created_at
      FROM error_logs ORDER BY id DESC LIMIT ?
    `),
    tableNames: db.prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
    ),
    totals: db.prepare<
      [],
      { images: number; bytes: number; errors: number; runs: number }
    >(`
      SELECT
        (SELECT COUNT(*) FROM images) AS images,
        (SELECT COALESCE(SUM(file_size), 0) FROM images) AS bytes,
        (SELECT COUNT(*) FROM error_logs) AS errors,
        (SELECT COUNT(*) FROM runs) AS runs
    `),
    day: db.prepare<[string], { downloaded: number; failed: number; bytes: number }>(
      "SELECT downloaded, failed, bytes FROM download_stats WHERE date = ?",
    ),
  };
}

// -----------------------------------------------------------------------------
// Store
// -----------------------------------------------------------------------------

export interface StoreOptions {
  migrationsDir?: string;
  now?: () => Date;
}

export class MetadataStore {
  private readonly db: Database.Database;
  private readonly stmt: ReturnType<typeof prepareStatements>;
  private readonly now: () => Date;

  /**
   * @param dbPath - Database file, or ":memory:"
   */
  constructor(dbPath: string, options: StoreOptions = {}) {
    this.now = options.now ?? (() => new Date());

    try {
      if (dbPath !== ":memory:") {
        fs.mkdirSync(path.dirname(dbPath), { recursive: true });
      }
      this.db = new Database(dbPath);
      this.db.pragma("journal_mode = WAL");
      this.db.pragma("foreign_keys = ON");
      this.runMigrations(options.migrationsDir ?? DEFAULT_MIGRATIONS_DIR);
      this.stmt = prepareStatements(this.db);
    } catch (error) {
      throw new PersistenceError(
        `Cannot open store at ${dbPath}: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  // ---------------------------------------------------------------------------
  // Migrations
  // ---------------------------------------------------------------------------

  private runMigrations(migrationsDir: string): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS migrations (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT UNIQUE,
        applied_at TEXT DEFAULT CURRENT_TIMESTAMP
      )
    `);

    const rows = this.db
      .prepare<[], { name: string }>("SELECT name FROM migrations")
      .all();
    const applied = new Set(rows.map((r) => r.name));
    const record = this.db.prepare<[string]>(
      "INSERT INTO migrations (name) VALUES (?)",
    );

    const files = fs
      .readdirSync(migrationsDir)
      .filter((f) => f.endsWith(".sql"))
      .sort();

    for (const file of files) {
      if (applied.has(file)) continue;
      const sql = fs.readFileSync(path.join(migrationsDir, file), "utf-8");
      this.db.transaction(() => {
        this.db.exec(sql);
        record.run(file);
      })();
    }
  }

  // ---------------------------------------------------------------------------
  // Writes
  // ---------------------------------------------------------------------------

  /**
   * Insert the record with its categories and URLs, all-or-nothing
   */
  commit(record: ImageRecord, categories: string[], urls: ImageUrl[] = []): void {
    const timestamp = this.timestamp();

    const insert = this.db.transaction(() => {
      this.stmt.insertImage.run(toRow(record));

      for (const name of new Set(categories)) {
        this.stmt.upsertCategory.run(name, timestamp);
        const category = this.stmt.getCategoryId.get(name);
        if (!category) {
          throw new Error(`Category "${name}" missing after upsert`);
        }
        this.stmt.linkCategory.run(record.id, category.id);
      }

      for (const url of urls) {
        this.stmt.insertUrl.run(record.id, url.type, url.url, timestamp);
      }

      this.stmt.bumpDownloaded.run(timestamp.slice(0, 10), record.fileSize);
    });

    this.guard(`commit image ${record.id}`, () => insert());
  }

  /**
   * Append an error entry in its own transaction
   */
  recordError(entry: Omit<ErrorLogEntry, "createdAt">): ErrorLogEntry {
    const created: ErrorLogEntry = { ...entry, createdAt: this.timestamp() };

    const insert = this.db.transaction(() => {
      this.stmt.insertError.run({
        image_id: created.imageId,
        phase: created.phase,
        error_class: created.errorClass,
        message: created.message,
        url: created.url,
        retry_count: created.retryCount,
        run_id: created.runId,
        created_at: created.createdAt,
      });
      if (created.phase === "download") {
        this.stmt.bumpFailed.run(created.createdAt.slice(0, 10));
      }
    });

    this.guard("record error", () => insert());
    return created;
  }

  advanceCursor(cursor: FetchCursor): void {
    this.guard(`advance cursor of ${cursor.stream}`, () => {
      this.stmt.upsertCursor.run({
        stream: cursor.stream,
        page: cursor.page,
        run_id: cursor.runId,
        exhausted: cursor.exhausted ? 1 : 0,
        updated_at: this.timestamp(),
      });
    });
  }

  loadCursor(stream: string): FetchCursor | null {
    const row = this.guard("load cursor", () => this.stmt.getCursor.get(stream));
    if (!row) return null;
    return {
      stream: row.stream,
      page: row.page,
      runId: row.run_id,
      exhausted: row.exhausted === 1,
    };
  }

  /**
   * Open a run; ids grow monotonically
   */
  beginRun(stream: string): number {
    const result = this.guard("begin run", () =>
      this.stmt.insertRun.run(stream, this.timestamp()),
    );
    return Number(result.lastInsertRowid);
  }

  finishRun(runId: number, state: RunState, reason: string): void {
    this.guard("finish run", () =>
      this.stmt.finishRun.run(this.timestamp(), state, reason, runId),
    );
  }

  /**
   * Remove a record and everything attached to it (repair only)
   */
  deleteImage(id: string): boolean {
    const remove = this.db.transaction(() => {
      this.stmt.deleteImageCategories.run(id);
      this.stmt.deleteImageUrls.run(id);
      return this.stmt.deleteImage.run(id).changes > 0;
    });
    return this.guard(`delete image ${id}`, () => remove());
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  *imageIds(): Generator<string> {
    for (const row of this.stmt.allImageIds.iterate()) {
      yield row.id;
    }
  }

  *records(): Generator<ImageRecord> {
    for (const row of this.stmt.allImages.iterate()) {
      yield toRecord(row);
    }
  }

  /**
   * Id of the record whose file has this name, compared case-insensitively
   */
  fileOwner(filePath: string): string | null {
    const row = this.guard("look up file owner", () =>
      this.stmt.fileOwner.get(filePath),
    );
    return row?.id ?? null;
  }

  /**
   * Latest run id of every stream that has run
   */
  lastRuns(): Map<string, number> {
    const rows = this.guard("list runs", () => this.stmt.lastRuns.all());
    return new Map(rows.map((r) => [r.stream, r.id]));
  }

  getImage(id: string): ImageDetail | null {
    const row = this.stmt.getImage.get(id);
    if (!row) return null;
    return {
      record: toRecord(row),
      categories: this.stmt.imageCategories.all(id).map((r) => r.name),
      urls: this.stmt.imageUrls
        .all(id)
        .map((r) => ({ type: r.url_type, url: r.url })),
    };
  }

  /**
   * Keyword search over description, attribution and category names
   */
  search(keyword: string, limit = 50): ImageRecord[] {
    const pattern = `%${escapeLike(keyword)}%`;
    return this.stmt.search.all({ pattern, limit }).map(toRecord);
  }

  listByCategory(name: string, limit = 50): ImageRecord[] {
    return this.stmt.byCategory.all(name, limit).map(toRecord);
  }

  listCategories(): CategorySummary[] {
    return this.stmt.categories.all();
  }

  getDownloadUrls(imageId?: string, limit = 20): DownloadUrlRow[] {
    const rows = imageId
      ? this.stmt.imageUrls.all(imageId)
      : this.stmt.recentUrls.all(limit);
    return rows.map((r) => ({
      imageId: r.image_id,
      type: r.url_type,
      url: r.url,
      recordedAt: r.recorded_at,
    }));
  }

  listErrors(limit = 20): ErrorLogEntry[] {
    return this.stmt.recentErrors.all(limit).map(toErrorEntry);
  }

  listTables(): TableSummary[] {
    return this.stmt.tableNames.all().map(({ name }) => {
      const row = this.db
        .prepare<[], { total: number }>(
          `SELECT COUNT(*) AS total FROM "${name.replace(/"/g, '""')}"`,
        )
        .get();
      return { name, rows: row?.total ?? 0 };
    });
  }

  missingTables(): string[] {
    const present = new Set(this.stmt.tableNames.all().map((r) => r.name));
    return REQUIRED_TABLES.filter((t) => !present.has(t));
  }

  getStats(): StoreStats {
    const totals = this.stmt.totals.get();
    const today = this.stmt.day.get(this.timestamp().slice(0, 10));
    return {
      totalImages: totals?.images ?? 0,
      totalBytes: totals?.bytes ?? 0,
      totalErrors: totals?.errors ?? 0,
      totalRuns: totals?.runs ?? 0,
      today: today ?? { downloaded: 0, failed: 0, bytes: 0 },
      categories: this.listCategories(),
    };
  }

  close(): void {
    this.db.close();
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private timestamp(): string {
    return this.now().toISOString();
  }

  private guard<T>(action: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof PersistenceError) throw error;
      throw new PersistenceError(`Failed to ${action}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
