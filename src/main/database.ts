import initSqlJs, { type Database as SqlJsDatabase, type SqlValue } from 'sql.js'
import { join } from 'path'
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs'
import {
  WATCH_STATUSES,
  type EpisodeProgress,
  type LibraryEntry,
  type WatchStatus
} from '../types'
import type { ProviderShow } from './providers'

type Row = Record<string, SqlValue>

let db: SqlJsDatabase | null = null
let dbPath: string | null = null
let saveTimer: ReturnType<typeof setInterval> | null = null

/**
 * Open (or create) the library database. Without a data directory the
 * database lives in memory only.
 */
export async function initDatabase(dataDir?: string): Promise<void> {
  const SQL = await initSqlJs()

  if (dataDir) {
    if (!existsSync(dataDir)) {
      mkdirSync(dataDir, { recursive: true })
    }
    dbPath = join(dataDir, 'library.db')
    db = existsSync(dbPath) ? new SQL.Database(readFileSync(dbPath)) : new SQL.Database()
  } else {
    dbPath = null
    db = new SQL.Database()
  }

  createTables()
  persistToFile()

  if (dbPath) {
    // Auto-save every 30 seconds; never keeps the process alive on its own
    saveTimer = setInterval(persistToFile, 30_000)
    saveTimer.unref()
  }

  console.log(`[Database] Initialized at ${dbPath ?? ':memory:'}`)
}

function getDb(): SqlJsDatabase {
  if (!db) throw new Error('Database not initialized')
  return db
}

function createTables(): void {
  const conn = getDb()

  conn.run(`
    CREATE TABLE IF NOT EXISTS anime (
      anilist_id INTEGER PRIMARY KEY,
      title TEXT NOT NULL,
      status TEXT NOT NULL DEFAULT 'PLANNING',
      progress INTEGER NOT NULL DEFAULT 0,
      episodes_total INTEGER,
      score REAL,
      dirty INTEGER NOT NULL DEFAULT 0,
      added_at DATETIME DEFAULT (datetime('now')),
      updated_at DATETIME DEFAULT (datetime('now'))
    )
  `)

  conn.run(`
    CREATE TABLE IF NOT EXISTS watch_progress (
      anilist_id INTEGER NOT NULL,
      episode_number INTEGER NOT NULL,
      watched_percent REAL NOT NULL DEFAULT 0,
      completed INTEGER NOT NULL DEFAULT 0,
      source TEXT,
      watched_at DATETIME DEFAULT (datetime('now')),
      PRIMARY KEY (anilist_id, episode_number),
      FOREIGN KEY (anilist_id) REFERENCES anime(anilist_id) ON DELETE CASCADE
    )
  `)

  conn.run(`
    CREATE TABLE IF NOT EXISTS provider_cache (
      anilist_id INTEGER NOT NULL,
      provider TEXT NOT NULL,
      provider_id TEXT NOT NULL,
      provider_title TEXT NOT NULL,
      cached_at DATETIME DEFAULT (datetime('now')),
      PRIMARY KEY (anilist_id, provider)
    )
  `)

  conn.run('CREATE INDEX IF NOT EXISTS idx_anime_status ON anime(status)')
  conn.run('CREATE INDEX IF NOT EXISTS idx_progress_watched ON watch_progress(watched_at)')
}

function persistToFile(): void {
  if (!db || !dbPath) return
  writeFileSync(dbPath, Buffer.from(db.export()))
}

// ─── Query helpers ────────────────────────────────────────────

function queryAll(sql: string, params: SqlValue[] = []): Row[] {
  const stmt = getDb().prepare(sql)
  stmt.bind(params)
  const results: Row[] = []
  while (stmt.step()) {
    results.push(stmt.getAsObject())
  }
  stmt.free()
  return results
}

function queryOne(sql: string, params: SqlValue[] = []): Row | null {
  return queryAll(sql, params)[0] ?? null
}

function execute(sql: string, params: SqlValue[] = []): void {
  getDb().run(sql, params)
  persistToFile()
}

// ─── Row mapping ──────────────────────────────────────────────

function text(value: SqlValue): string {
  return typeof value === 'string' ? value : ''
}

function num(value: SqlValue): number {
  return typeof value === 'number' ? value : 0
}

function nullableNumber(value: SqlValue): number | null {
  return typeof value === 'number' ? value : null
}

function toStatus(value: SqlValue): WatchStatus {
  return WATCH_STATUSES.find((s) => s === value) ?? 'PLANNING'
}

function toLibraryEntry(row: Row): LibraryEntry {
  return {
    anilistId: num(row.anilist_id),
    title: text(row.title),
    status: toStatus(row.status),
    progress: num(row.progress),
    episodesTotal: nullableNumber(row.episodes_total),
    score: nullableNumber(row.score),
    dirty: row.dirty === 1,
    updatedAt: text(row.updated_at)
  }
}

function toEpisodeProgress(row: Row): EpisodeProgress {
  return {
    anilistId: num(row.anilist_id),
    episodeNumber: num(row.episode_number),
    watchedPercent: num(row.watched_percent),
    completed: row.completed === 1,
    source: typeof row.source === 'string' ? row.source : null,
    watchedAt: text(row.watched_at)
  }
}

// ─── Library ──────────────────────────────────────────────────

export interface AnimeRecord {
  anilistId: number
  title: string
  episodesTotal: number | null
  score: number | null
}

/** Inserts or refreshes metadata; status and progress are left alone */
export function upsertAnime(anime: AnimeRecord, status: WatchStatus = 'PLANNING'): void {
  execute(
    `INSERT INTO anime (anilist_id, title, status, episodes_total, score)
     VALUES (?, ?, ?, ?, ?)
     ON CONFLICT(anilist_id) DO UPDATE SET
       title = excluded.title,
       episodes_total = excluded.episodes_total,
       score = excluded.score,
       updated_at = datetime('now')`,
    [anime.anilistId, anime.title, status, anime.episodesTotal, anime.score]
  )
}

export function getLibrary(status?: WatchStatus): LibraryEntry[] {
  const rows = status
    ? queryAll('SELECT * FROM anime WHERE status = ? ORDER BY updated_at DESC, anilist_id', [status])
    : queryAll('SELECT * FROM anime ORDER BY updated_at DESC, anilist_id')
  return rows.map(toLibraryEntry)
}

export function getAnime(anilistId: number): LibraryEntry | null {
  const row = queryOne('SELECT * FROM anime WHERE anilist_id = ?', [anilistId])
  return row ? toLibraryEntry(row) : null
}

export function updateStatus(anilistId: number, status: WatchStatus): void {
  execute(
    "UPDATE anime SET status = ?, updated_at = datetime('now') WHERE anilist_id = ?",
    [status, anilistId]
  )
}

export function removeAnime(anilistId: number): void {
  execute('DELETE FROM watch_progress WHERE anilist_id = ?', [anilistId])
  execute('DELETE FROM provider_cache WHERE anilist_id = ?', [anilistId])
  execute('DELETE FROM anime WHERE anilist_id = ?', [anilistId])
}

// ─── Watch Progress ───────────────────────────────────────────

export interface ProgressRecord {
  anilistId: number
  episodeNumber: number
  watchedPercent: number
  completed: boolean
  /** Provider source label the episode was played from */
  source?: string | null
}

/**
 * Store the watched percentage of one episode. A completed episode past the
 * entry's progress moves the progress forward and marks the entry CURRENT.
 */
export function saveEpisodeProgress(progress: ProgressRecord): void {
  execute(
    `INSERT INTO watch_progress (anilist_id, episode_number, watched_percent, completed, source)
     VALUES (?, ?, ?, ?, ?)
     ON CONFLICT(anilist_id, episode_number) DO UPDATE SET
       watched_percent = excluded.watched_percent,
       completed = MAX(completed, excluded.completed),
       source = COALESCE(excluded.source, source),
       watched_at = datetime('now')`,
    [
      progress.anilistId,
      progress.episodeNumber,
      progress.watchedPercent,
      progress.completed ? 1 : 0,
      progress.source ?? null
    ]
  )

  if (progress.completed) {
    execute(
      `UPDATE anime SET progress = ?, status = CASE WHEN status = 'COMPLETED' THEN status ELSE 'CURRENT' END,
         updated_at = datetime('now')
       WHERE anilist_id = ? AND progress < ?`,
      [progress.episodeNumber, progress.anilistId, progress.episodeNumber]
    )
  }
}

export function getProgress(anilistId: number): EpisodeProgress[] {
  return queryAll(
    'SELECT * FROM watch_progress WHERE anilist_id = ? ORDER BY episode_number ASC',
    [anilistId]
  ).map(toEpisodeProgress)
}

export function getEpisodeProgress(anilistId: number, episodeNumber: number): EpisodeProgress | null {
  const row = queryOne(
    'SELECT * FROM watch_progress WHERE anilist_id = ? AND episode_number = ?',
    [anilistId, episodeNumber]
  )
  return row ? toEpisodeProgress(row) : null
}

// ─── Sync state ───────────────────────────────────────────────

export function markDirty(anilistId: number): void {
  execute('UPDATE anime SET dirty = 1 WHERE anilist_id = ?', [anilistId])
}

export function markSynced(anilistId: number): void {
  execute('UPDATE anime SET dirty = 0 WHERE anilist_id = ?', [anilistId])
}

export function getDirtyEntries(): LibraryEntry[] {
  return queryAll('SELECT * FROM anime WHERE dirty = 1 ORDER BY anilist_id').map(toLibraryEntry)
}

// ─── Provider Cache ───────────────────────────────────────────

export function getProviderMapping(anilistId: number, provider: string): ProviderShow | null {
  const row = queryOne(
    'SELECT provider_id, provider_title FROM provider_cache WHERE anilist_id = ? AND provider = ?',
    [anilistId, provider]
  )
  return row ? { id: text(row.provider_id), name: text(row.provider_title) } : null
}

export function setProviderMapping(anilistId: number, provider: string, show: ProviderShow): void {
  execute(
    `INSERT OR REPLACE INTO provider_cache (anilist_id, provider, provider_id, provider_title, cached_at)
     VALUES (?, ?, ?, ?, datetime('now'))`,
    [anilistId, provider, show.id, show.name]
  )
}

export function clearProviderMapping(anilistId: number): void {
  execute('DELETE FROM provider_cache WHERE anilist_id = ?', [anilistId])
}

export function closeDatabase(): void {
  if (saveTimer) clearInterval(saveTimer)
  saveTimer = null
  if (db) {
    persistToFile()
    db.close()
    db = null
  }
}
