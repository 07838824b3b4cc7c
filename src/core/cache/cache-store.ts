// SQLite store persisting the last fetched projects, agents and messages

import Database from 'better-sqlite3';
import { dirname } from 'path';
import { mkdirSync, existsSync, statSync } from 'fs';
import type { IAgent, IMessage, IProject } from '../interfaces/entities.js';
import { UNKNOWN_LIVE_STATUS } from '../interfaces/entities.js';
import { parseRole } from '../parsers/entities.js';
import { SyncError, SyncErrorCode } from '../errors/sync-error.js';
import { DEFAULT_CACHE_PATH } from '../../config/defaults.js';

export interface ICachedProject {
  id: string;
  name: string;
  description: string;
  created_at: number;
  agent_count: number;
  active_agent_count: number;
  position: number;
}

export interface ICachedAgent {
  id: string;
  project_id: string;
  title: string;
  description: string;
  is_default: number;
  is_finished: number;
  status: string;
  created_at: number;
  position: number;
}

export interface ICachedMessage {
  id: string;
  agent_id: string;
  role: string;
  text: string;
  timestamp: number;
  persona: string;
  position: number;
}

export interface ICacheSnapshot {
  projects: IProject[];
  agents: Record<string, IAgent[]>;
  messages: Record<string, IMessage[]>;
}

export interface ICacheStats {
  projects: number;
  agents: number;
  messages: number;
  dbSize: string;
}

const MEMORY_PATH = ':memory:';

function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

export class CacheStore {
  private db: Database.Database;
  private readonly dbPath: string;

  constructor(dbPath?: string) {
    this.dbPath = dbPath ?? DEFAULT_CACHE_PATH;

    if (this.dbPath !== MEMORY_PATH) {
      const dir = dirname(this.dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    try {
      this.db = new Database(this.dbPath);
      this.initialize();
    } catch (error) {
      throw new SyncError(
        SyncErrorCode.CACHE_INIT_FAILED,
        `Failed to initialize SQLite cache: ${error instanceof Error ? error.message : String(error)}`,
        { dbPath: this.dbPath }
      );
    }
  }

  private initialize(): void {
    // Cache can always be rebuilt from the gateway
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS projects (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        description TEXT NOT NULL DEFAULT '',
        created_at INTEGER NOT NULL,
        agent_count INTEGER NOT NULL DEFAULT 0,
        active_agent_count INTEGER NOT NULL DEFAULT 0,
        position INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS agents (
        id TEXT PRIMARY KEY,
        project_id TEXT NOT NULL,
        title TEXT NOT NULL,
        description TEXT NOT NULL DEFAULT '',
        is_default INTEGER NOT NULL DEFAULT 0,
        is_finished INTEGER NOT NULL DEFAULT 0,
        status TEXT NOT NULL,
        created_at INTEGER NOT NULL,
        position INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS messages (
        id TEXT PRIMARY KEY,
        agent_id TEXT NOT NULL,
        role TEXT NOT NULL,
        text TEXT NOT NULL,
        timestamp INTEGER NOT NULL,
        persona TEXT NOT NULL,
        position INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_agents_project ON agents(project_id, position);
      CREATE INDEX IF NOT EXISTS idx_messages_agent ON messages(agent_id, position);
    `);
  }

  get path(): string {
    return this.dbPath;
  }

  replaceProjects(projects: IProject[]): void {
    const insert = this.db.prepare(`
      INSERT OR REPLACE INTO projects (id, name, description, created_at, agent_count, active_agent_count, position)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `);
    this.write('projects', () => {
      this.db.prepare('DELETE FROM projects').run();
      projects.forEach((p, position) => {
        insert.run(p.id, p.name, p.description, p.createdAt, p.agentCount, p.activeAgentCount, position);
      });
    });
  }

  replaceAgents(projectId: string, agents: IAgent[]): void {
    const insert = this.db.prepare(`
      INSERT OR REPLACE INTO agents (id, project_id, title, description, is_default, is_finished, status, created_at, position)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    this.write('agents', () => {
      this.db.prepare('DELETE FROM agents WHERE project_id = ?').run(projectId);
      agents.forEach((a, position) => {
        insert.run(
          a.id,
          projectId,
          a.title,
          a.description,
          a.isDefault ? 1 : 0,
          a.isFinished ? 1 : 0,
          a.status,
          a.createdAt,
          position
        );
      });
    });
  }

  replaceMessages(agentId: string, messages: IMessage[]): void {
    const insert = this.db.prepare(`
      INSERT OR REPLACE INTO messages (id, agent_id, role, text, timestamp, persona, position)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `);
    this.write('messages', () => {
      this.db.prepare('DELETE FROM messages WHERE agent_id = ?').run(agentId);
      messages.forEach((m, position) => {
        insert.run(m.id, agentId, m.role, m.text, m.timestamp, m.persona, position);
      });
    });
  }

  // Live fields are not persisted; they come back with the first poll
  loadSnapshot(): ICacheSnapshot {
    const projectRows = this.db
      .prepare('SELECT * FROM projects ORDER BY position')
      .all() as ICachedProject[];
    const agentRows = this.db
      .prepare('SELECT * FROM agents ORDER BY project_id, position')
      .all() as ICachedAgent[];
    const messageRows = this.db
      .prepare('SELECT * FROM messages ORDER BY agent_id, position')
      .all() as ICachedMessage[];

    const agents: Record<string, IAgent[]> = {};
    for (const row of agentRows) {
      (agents[row.project_id] ??= []).push({
        id: row.id,
        projectId: row.project_id,
        title: row.title,
        description: row.description,
        isDefault: row.is_default === 1,
        isFinished: row.is_finished === 1,
        status: row.status,
        createdAt: row.created_at,
        ...UNKNOWN_LIVE_STATUS,
      });
    }

    const messages: Record<string, IMessage[]> = {};
    for (const row of messageRows) {
      (messages[row.agent_id] ??= []).push({
        id: row.id,
        agentId: row.agent_id,
        role: parseRole(row.role),
        text: row.text,
        timestamp: row.timestamp,
        persona: row.persona,
      });
    }

    return {
      projects: projectRows.map(row => ({
        id: row.id,
        name: row.name,
        description: row.description,
        createdAt: row.created_at,
        agentCount: row.agent_count,
        activeAgentCount: row.active_agent_count,
      })),
      agents,
      messages,
    };
  }

  getStats(): ICacheStats {
    const count = (table: string): number =>
      (this.db.prepare(`SELECT COUNT(*) as count FROM ${table}`).get() as { count: number }).count;

    let dbSize = '0 B';
    if (this.dbPath !== MEMORY_PATH && existsSync(this.dbPath)) {
      dbSize = formatBytes(statSync(this.dbPath).size);
    }

    return {
      projects: count('projects'),
      agents: count('agents'),
      messages: count('messages'),
      dbSize,
    };
  }

  clear(): void {
    this.db.exec('DELETE FROM projects; DELETE FROM agents; DELETE FROM messages;');
  }

  close(): void {
    this.db.close();
  }

  private write(table: string, fn: () => void): void {
    try {
      this.db.transaction(fn)();
    } catch (error) {
      throw new SyncError(
        SyncErrorCode.CACHE_WRITE_FAILED,
        `Failed to write ${table} to cache: ${error instanceof Error ? error.message : String(error)}`,
        { table }
      );
    }
  }
}
