import fs from "fs";
import path from "path";
import { Pool } from "pg";
import type { QueryResult, QueryResultRow } from "pg";
import type { NewVideo, ProcessedUpdate, VideoRecord, VideoStore } from "../types";

const SCHEMA_PATH = path.resolve(__dirname, "../../sql/schema.sql");

const VIDEO_COLUMNS =
  "id, created_at, title, description, category, source_file_path, thumbnail_path, hls_base_dir, processed";

export interface VideoRow extends QueryResultRow {
  id: number;
  created_at: Date;
  title: string;
  description: string;
  category: string;
  source_file_path: string | null;
  thumbnail_path: string | null;
  hls_base_dir: string;
  processed: boolean;
}

// The parts of pg's Pool and PoolClient the store touches
export interface VideoQueryable {
  query(text: string, values?: unknown[]): Promise<QueryResult<VideoRow>>;
}

export interface VideoPoolClient extends VideoQueryable {
  release(): void;
}

export interface VideoPool extends VideoQueryable {
  connect(): Promise<VideoPoolClient>;
}

export const createPool = (connectionString: string): Pool =>
  new Pool({
    connectionString,
    max: 20,
  });

export const applySchema = async (pool: Pool): Promise<void> => {
  const sql = await fs.promises.readFile(SCHEMA_PATH, "utf8");
  await pool.query(sql);
};

export const toVideoRecord = (row: VideoRow): VideoRecord => ({
  id: row.id,
  createdAt: row.created_at,
  title: row.title,
  description: row.description,
  category: row.category,
  sourceFilePath: row.source_file_path,
  thumbnailPath: row.thumbnail_path,
  hlsBaseDir: row.hls_base_dir,
  processed: row.processed,
});

export class PgVideoStore implements VideoStore {
  constructor(private readonly pool: VideoPool) {}

  async findById(id: number): Promise<VideoRecord | null> {
    const res = await this.pool.query(
      `SELECT ${VIDEO_COLUMNS} FROM videos WHERE id = $1`,
      [id],
    );
    return res.rows.length > 0 ? toVideoRecord(res.rows[0]) : null;
  }

  async list(): Promise<VideoRecord[]> {
    const res = await this.pool.query(
      `SELECT ${VIDEO_COLUMNS} FROM videos ORDER BY created_at DESC, id DESC`,
    );
    return res.rows.map(toVideoRecord);
  }

  async create(input: NewVideo): Promise<VideoRecord> {
    const res = await this.pool.query(
      `INSERT INTO videos (title, description, category, source_file_path)
       VALUES ($1, $2, $3, $4) RETURNING ${VIDEO_COLUMNS}`,
      [input.title, input.description, input.category, input.sourceFilePath],
    );
    if (res.rows.length === 0) throw new Error("Failed to insert video into DB");
    return toVideoRecord(res.rows[0]);
  }

  // Row lock + update in one transaction so racing runs cannot interleave field writes.
  async markProcessed(id: number, update: ProcessedUpdate): Promise<void> {
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      await client.query("SELECT id FROM videos WHERE id = $1 FOR UPDATE", [id]);
      await client.query(
        `UPDATE videos
            SET hls_base_dir = $1, thumbnail_path = COALESCE($2, thumbnail_path), processed = true
          WHERE id = $3`,
        [update.hlsBaseDir, update.thumbnailPath, id],
      );
      await client.query("COMMIT");
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }
}
