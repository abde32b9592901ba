/**
 * Session persistence: one JSON file per session under `<stateDir>/sessions/`.
 */

import { createHash } from 'node:crypto';
import type { Dirent } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';

import { SessionStoreError } from './errors.js';
import { compactWithLog, type HistoryBudget } from './history.js';
import type { Message, Role, Session } from './types.js';
import { isRecord, nowIso, stateDir, writeJsonAtomic } from './utils.js';

const ROLES: readonly Role[] = ['system', 'user', 'assistant', 'tool'];

export function sessionsDir(): string {
  return path.join(stateDir(), 'sessions');
}

// ── Naming ───────────────────────────────────────────────────────────

export function sanitizeSessionName(name: string): string {
  const cleaned = name.trim().replace(/[^A-Za-z0-9_-]/g, '_');
  return cleaned || 'session';
}

/**
 * Deterministic key for a workspace: `ws-<leaf>-<hash>`, where hash is the
 * first 16 hex chars of sha256(resolved path). Same path, same session.
 */
export function sessionKeyForWorkspace(cwd: string): string {
  const abs = path.resolve(cwd);
  const hash = createHash('sha256').update(abs).digest('hex').slice(0, 16);
  const leaf = sanitizeSessionName(path.basename(abs) || 'root');
  return `ws-${leaf}-${hash}`;
}

/** `default`/`auto`/empty → workspace key; anything else → sanitized explicit name. */
export function resolveSessionName(requested: string | undefined, cwd: string): string {
  const r = requested?.trim() ?? '';
  if (!r || r === 'default' || r === 'auto') return sessionKeyForWorkspace(cwd);
  return sanitizeSessionName(r);
}

/** Unused name for `/new` without an argument. */
export function freshSessionName(cwd: string, now: Date = new Date()): string {
  return `${sessionKeyForWorkspace(cwd)}-${Math.floor(now.getTime() / 1000)}`;
}

// ── Session values ───────────────────────────────────────────────────

export function newSession(id: string): Session {
  const ts = nowIso();
  return { id, messages: [], createdAt: ts, lastActiveAt: ts };
}

export function makeMessage(role: Role, content: string): Message {
  return { role, content, timestamp: nowIso() };
}

/** Put `prompt` at index 0 as the one system message, replacing any previous one. */
export function setSystemMessage(session: Session, prompt: string): void {
  const msg = makeMessage('system', prompt);
  if (session.messages[0]?.role === 'system') session.messages[0] = msg;
  else session.messages.unshift(msg);
}

function parseMessage(v: unknown): Message | null {
  if (!isRecord(v)) return null;
  const role = ROLES.find((r) => r === v.role);
  if (!role || typeof v.content !== 'string') return null;
  return { role, content: v.content, timestamp: typeof v.timestamp === 'string' ? v.timestamp : '' };
}

function parseSession(raw: unknown, id: string, file: string): Session {
  if (!isRecord(raw) || !Array.isArray(raw.messages)) {
    throw new SessionStoreError(`session file is not a session object`, file);
  }
  const messages: Message[] = [];
  for (const [i, m] of raw.messages.entries()) {
    const parsed = parseMessage(m);
    if (!parsed) throw new SessionStoreError(`session message #${i} is malformed`, file);
    messages.push(parsed);
  }
  const created = typeof raw.createdAt === 'string' ? raw.createdAt : nowIso();
  return {
    id,
    messages,
    createdAt: created,
    lastActiveAt: typeof raw.lastActiveAt === 'string' ? raw.lastActiveAt : created,
  };
}

// ── Store ────────────────────────────────────────────────────────────

export type SessionStoreOptions = {
  dir?: string;
  budget: HistoryBudget;
  summarize?: boolean;
  verbose?: boolean;
};

export class SessionStore {
  readonly dir: string;

  constructor(private readonly opts: SessionStoreOptions) {
    this.dir = opts.dir ?? sessionsDir();
  }

  get budget(): HistoryBudget {
    return this.opts.budget;
  }

  pathFor(id: string): string {
    return path.join(this.dir, `${sanitizeSessionName(id)}.json`);
  }

  /** Missing file → fresh empty session. Unparseable file → SessionStoreError. */
  async load(id: string): Promise<Session> {
    const file = this.pathFor(id);
    let raw: string;
    try {
      raw = await fs.readFile(file, 'utf8');
    } catch (e: unknown) {
      if (isRecord(e) && e.code === 'ENOENT') return newSession(id);
      throw new SessionStoreError(`cannot read session: ${String(e)}`, file);
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (e: unknown) {
      throw new SessionStoreError(
        `session file is corrupt (${e instanceof Error ? e.message : String(e)})`,
        file
      );
    }
    return parseSession(parsed, id, file);
  }

  async save(session: Session): Promise<void> {
    await writeJsonAtomic(this.pathFor(session.id), {
      id: session.id,
      createdAt: session.createdAt,
      lastActiveAt: session.lastActiveAt,
      messages: session.messages,
    });
  }

  /** Push `message`, then compact the session in place. Does not save. */
  append(session: Session, message: Message): Session {
    session.messages.push(message);
    session.lastActiveAt = message.timestamp || nowIso();
    this.compact(session);
    return session;
  }

  compact(session: Session): Session {
    session.messages = compactWithLog(session.messages, this.opts.budget, {
      summarize: this.opts.summarize,
      verbose: this.opts.verbose,
    });
    return session;
  }

  async list(): Promise<Array<{ name: string; path: string; updatedAt: number }>> {
    let ents: Dirent[];
    try {
      ents = await fs.readdir(this.dir, { withFileTypes: true });
    } catch (e: unknown) {
      if (isRecord(e) && e.code === 'ENOENT') return [];
      throw e;
    }
    const out: Array<{ name: string; path: string; updatedAt: number }> = [];
    for (const e of ents) {
      if (!e.isFile() || !e.name.endsWith('.json')) continue;
      const p = path.join(this.dir, e.name);
      const st = await fs.stat(p).catch(() => null);
      if (!st) continue;
      out.push({ name: e.name.replace(/\.json$/, ''), path: p, updatedAt: st.mtimeMs });
    }
    return out.sort((a, b) => b.updatedAt - a.updatedAt);
  }

  /** Delete a session file. Returns false when there was nothing to delete. */
  async remove(id: string): Promise<boolean> {
    try {
      await fs.unlink(this.pathFor(id));
      return true;
    } catch (e: unknown) {
      if (isRecord(e) && e.code === 'ENOENT') return false;
      throw e;
    }
  }
}
