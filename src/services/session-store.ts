import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import type { ChatMessage, ChatRole } from '../core/types.js';
import type { SessionListing, SessionRecord, WaypointRecord } from '../types/session.js';
import { isStringArray, readNumber, readString, tryParseJson } from '../utils/json.js';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS sessions (
    session_id TEXT PRIMARY KEY,
    title TEXT NOT NULL,
    summary_xml TEXT,
    summarized_up_to INTEGER NOT NULL DEFAULT 0,
    token_count INTEGER NOT NULL DEFAULT 0,
    models_used TEXT NOT NULL DEFAULT '[]',
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS session_messages (
    session_id TEXT NOT NULL,
    position INTEGER NOT NULL,
    role TEXT NOT NULL,
    content TEXT NOT NULL,
    PRIMARY KEY (session_id, position),
    FOREIGN KEY(session_id) REFERENCES sessions(session_id) ON DELETE CASCADE
  );

  CREATE TABLE IF NOT EXISTS session_waypoints (
    session_id TEXT NOT NULL,
    message_index INTEGER NOT NULL,
    created_at TEXT NOT NULL,
    PRIMARY KEY (session_id, message_index),
    FOREIGN KEY(session_id) REFERENCES sessions(session_id) ON DELETE CASCADE
  );
`;

function toRole(value: string | null): ChatRole | null {
  return value === 'user' || value === 'assistant' ? value : null;
}

/**
 * Session archive over SQLite. Each save rewrites the session's messages and
 * waypoints inside one transaction, so a record is never half written.
 */
export class SessionStore {
  readonly #db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    this.#db = new Database(dbPath);
    this.#db.pragma('foreign_keys = ON');
    this.#db.exec(SCHEMA);
  }

  saveSession(record: SessionRecord): void {
    const upsertSession = this.#db.prepare(`
      INSERT INTO sessions (session_id, title, summary_xml, summarized_up_to, token_count, models_used, created_at, updated_at)
      VALUES (@sessionId, @title, @summaryXml, @summarizedUpTo, @tokenCount, @modelsUsed, @createdAt, @updatedAt)
      ON CONFLICT(session_id) DO UPDATE SET
        title = excluded.title,
        summary_xml = excluded.summary_xml,
        summarized_up_to = excluded.summarized_up_to,
        token_count = excluded.token_count,
        models_used = excluded.models_used,
        updated_at = excluded.updated_at
    `);
    const clearMessages = this.#db.prepare('DELETE FROM session_messages WHERE session_id = ?');
    const clearWaypoints = this.#db.prepare('DELETE FROM session_waypoints WHERE session_id = ?');
    const insertMessage = this.#db.prepare(
      'INSERT INTO session_messages (session_id, position, role, content) VALUES (?, ?, ?, ?)',
    );
    const insertWaypoint = this.#db.prepare(
      'INSERT OR IGNORE INTO session_waypoints (session_id, message_index, created_at) VALUES (?, ?, ?)',
    );

    const write = this.#db.transaction((input: SessionRecord) => {
      upsertSession.run({
        sessionId: input.sessionId,
        title: input.title,
        summaryXml: input.summaryXml,
        summarizedUpTo: input.summarizedUpTo,
        tokenCount: input.tokenCount,
        modelsUsed: JSON.stringify(input.modelsUsed),
        createdAt: input.createdAt,
        updatedAt: input.updatedAt,
      });
      clearMessages.run(input.sessionId);
      clearWaypoints.run(input.sessionId);
      input.messages.forEach((message, position) => {
        insertMessage.run(input.sessionId, position, message.role, message.content);
      });
      for (const waypoint of input.waypoints) {
        insertWaypoint.run(input.sessionId, waypoint.messageIndex, waypoint.createdAt);
      }
    });

    write(record);
  }

  loadSession(sessionId: string): SessionRecord | null {
    const row: unknown = this.#db.prepare('SELECT * FROM sessions WHERE session_id = ?').get(sessionId);
    const id = readString(row, 'session_id');
    if (id === null) {
      return null;
    }

    const messages: ChatMessage[] = [];
    const messageRows: unknown[] = this.#db
      .prepare('SELECT role, content FROM session_messages WHERE session_id = ? ORDER BY position ASC')
      .all(sessionId);
    for (const messageRow of messageRows) {
      const role = toRole(readString(messageRow, 'role'));
      const content = readString(messageRow, 'content');
      if (role && content !== null) {
        messages.push({ role, content });
      }
    }

    const waypoints: WaypointRecord[] = [];
    const waypointRows: unknown[] = this.#db
      .prepare('SELECT message_index, created_at FROM session_waypoints WHERE session_id = ? ORDER BY message_index ASC')
      .all(sessionId);
    for (const waypointRow of waypointRows) {
      const messageIndex = readNumber(waypointRow, 'message_index');
      const createdAt = readString(waypointRow, 'created_at');
      if (messageIndex !== null && createdAt !== null) {
        waypoints.push({ messageIndex, createdAt });
      }
    }

    const modelsUsed = tryParseJson(readString(row, 'models_used') ?? '[]');
    const createdAt = readString(row, 'created_at') ?? new Date(0).toISOString();

    return {
      sessionId: id,
      title: readString(row, 'title') ?? '',
      messages,
      summaryXml: readString(row, 'summary_xml'),
      summarizedUpTo: readNumber(row, 'summarized_up_to') ?? 0,
      waypoints,
      tokenCount: readNumber(row, 'token_count') ?? 0,
      modelsUsed: isStringArray(modelsUsed) ? modelsUsed : [],
      createdAt,
      updatedAt: readString(row, 'updated_at') ?? createdAt,
    };
  }

  /** Most recently updated first. */
  listSessions(limit = 50): SessionListing[] {
    const rows: unknown[] = this.#db.prepare(`
      SELECT s.session_id, s.title, s.updated_at, COUNT(m.position) AS message_count
      FROM sessions s
      LEFT JOIN session_messages m ON m.session_id = s.session_id
      GROUP BY s.session_id
      ORDER BY s.updated_at DESC, s.session_id ASC
      LIMIT ?
    `).all(Math.max(1, Math.floor(limit)));

    const listings: SessionListing[] = [];
    for (const row of rows) {
      const sessionId = readString(row, 'session_id');
      if (sessionId === null) continue;
      listings.push({
        sessionId,
        title: readString(row, 'title') ?? '',
        messageCount: readNumber(row, 'message_count') ?? 0,
        updatedAt: readString(row, 'updated_at') ?? '',
      });
    }
    return listings;
  }

  deleteSession(sessionId: string): boolean {
    const result = this.#db.prepare('DELETE FROM sessions WHERE session_id = ?').run(sessionId);
    return result.changes > 0;
  }

  close(): void {
    this.#db.close();
  }
}
