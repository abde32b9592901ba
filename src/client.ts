import { setTimeout as delay } from 'node:timers/promises';

import { Agent, fetch, type RequestInit, type Response } from 'undici';

import {
  ClientError,
  abortError,
  getRetryDelayMs,
  isAbort,
  isConnRefused,
} from './client/error-utils.js';
import { logTag } from './term.js';
import type { ChatClient, ChatRequest, Message, ModelsResponse } from './types.js';
import { isRecord } from './utils.js';

export { ClientError } from './client/error-utils.js';

// ── Persistent connection pool ───────────────────────────────────────────
// Reuses TCP+TLS connections across the reasoning calls of a turn.
const pooledAgent = new Agent({
  keepAliveTimeout: 30_000,
  keepAliveMaxTimeout: 120_000,
  connections: 16,
  pipelining: 1,
  connect: {
    rejectUnauthorized: true,
  },
});

type WireMessage = { role: 'system' | 'user' | 'assistant'; content: string };

/**
 * The tool protocol is plain text, so `tool` messages travel as `user`
 * turns on the wire.
 */
export function toWireMessages(messages: readonly Message[]): WireMessage[] {
  return messages.map((m) => ({
    role: m.role === 'tool' ? 'user' : m.role,
    content: m.content,
  }));
}

/** `content` may be a string or an array of `{type:'text', text}` parts. */
export function contentText(content: unknown): string {
  if (typeof content === 'string') return content;
  if (!Array.isArray(content)) return '';
  return content
    .map((p) => (isRecord(p) && typeof p.text === 'string' ? p.text : ''))
    .join('');
}

function firstChoice(body: unknown): Record<string, unknown> | undefined {
  if (!isRecord(body) || !Array.isArray(body.choices)) return undefined;
  const c: unknown = body.choices[0];
  return isRecord(c) ? c : undefined;
}

/** Text of `choices[0].delta.content` in one SSE chunk, or ''. */
export function deltaText(chunk: unknown): string {
  const delta = firstChoice(chunk)?.delta;
  return isRecord(delta) ? contentText(delta.content) : '';
}

export type ClientOptions = {
  temperature?: number;
  /** seconds */
  responseTimeout?: number;
  verbose?: boolean;
};

export class OpenAIClient implements ChatClient {
  private readonly temperature: number;
  private readonly responseTimeoutMs: number;
  private readonly verbose: boolean;

  constructor(
    private readonly endpoint: string,
    private readonly apiKey?: string,
    opts: ClientOptions = {}
  ) {
    this.endpoint = endpoint.replace(/\/+$/, '');
    this.temperature = opts.temperature ?? 0.2;
    this.responseTimeoutMs = Math.max(1, opts.responseTimeout ?? 120) * 1000;
    this.verbose = opts.verbose ?? false;
  }

  private log(msg: string): void {
    if (this.verbose) logTag('client', msg);
  }

  private headers(): Record<string, string> {
    const h: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) h.Authorization = `Bearer ${this.apiKey}`;
    return h;
  }

  /**
   * fetch bounded by `timeoutMs`. The caller's signal aborts the request too;
   * a caller abort surfaces as AbortError, our own timeout as ClientError.
   */
  private async fetchWithTimeout(
    url: string,
    init: RequestInit,
    timeoutMs: number,
    callerSignal?: AbortSignal
  ): Promise<{ res: Response; done: () => void; signal: AbortSignal }> {
    const ac = new AbortController();
    const onCallerAbort = () => ac.abort();
    callerSignal?.addEventListener('abort', onCallerAbort, { once: true });
    const timer = setTimeout(() => ac.abort(), timeoutMs);
    const done = () => {
      clearTimeout(timer);
      callerSignal?.removeEventListener('abort', onCallerAbort);
    };
    try {
      const res = await fetch(url, { ...init, signal: ac.signal, dispatcher: pooledAgent });
      return { res, done, signal: ac.signal };
    } catch (e: unknown) {
      done();
      throw this.translate(e, url, timeoutMs, ac.signal, callerSignal);
    }
  }

  private translate(
    e: unknown,
    url: string,
    timeoutMs: number,
    own: AbortSignal,
    callerSignal?: AbortSignal
  ): Error {
    if (callerSignal?.aborted) return isAbort(e) ? asErr(e) : abortError();
    if (own.aborted) return new ClientError(`Response timeout (${timeoutMs}ms) waiting for ${url}`, undefined, true, 'TIMEOUT');
    if (e instanceof ClientError) return e;
    if (isConnRefused(e)) {
      return new ClientError(`Cannot reach ${this.endpoint} (${asErr(e).message})`, undefined, true, 'ECONNREFUSED');
    }
    return new ClientError(asErr(e).message);
  }

  async models(signal?: AbortSignal): Promise<ModelsResponse> {
    const url = `${this.endpoint}/models`;
    const { res, done } = await this.fetchWithTimeout(url, { method: 'GET', headers: this.headers() }, 10_000, signal);
    try {
      if (!res.ok) throw new ClientError(`GET /models failed: ${res.status} ${res.statusText}`, res.status);
      const body: unknown = await res.json();
      const data = isRecord(body) && Array.isArray(body.data) ? body.data : [];
      return {
        object: isRecord(body) && typeof body.object === 'string' ? body.object : undefined,
        data: data.flatMap((m: unknown) =>
          isRecord(m) && typeof m.id === 'string'
            ? [{ id: m.id, owned_by: typeof m.owned_by === 'string' ? m.owned_by : undefined }]
            : []
        ),
      };
    } finally {
      done();
    }
  }

  /**
   * One chat completion. Streams when `onToken` is given. Retries once, with
   * backoff, on 429/503 and on a refused connection.
   */
  async chat(req: ChatRequest): Promise<string> {
    const url = `${this.endpoint}/chat/completions`;
    const stream = Boolean(req.onToken);
    const body = JSON.stringify({
      model: req.model,
      messages: toWireMessages(req.messages),
      temperature: this.temperature,
      stream,
    });

    this.log(`→ POST ${url} (${req.messages.length} messages${stream ? ', stream' : ''})`);

    for (let attempt = 0; ; attempt++) {
      const canRetry = attempt < 1;
      let conn: { res: Response; done: () => void; signal: AbortSignal };
      try {
        conn = await this.fetchWithTimeout(
          url,
          { method: 'POST', headers: this.headers(), body },
          this.responseTimeoutMs,
          req.signal
        );
      } catch (e: unknown) {
        if (canRetry && e instanceof ClientError && e.code === 'ECONNREFUSED') {
          const backoff = 2000;
          this.log(`connection refused, retrying in ${backoff}ms...`);
          await delay(getRetryDelayMs(backoff), undefined, { signal: req.signal });
          continue;
        }
        throw e;
      }

      const { res, done, signal } = conn;
      try {
        if (res.status === 429 || res.status === 503) {
          await res.body?.cancel();
          if (canRetry) {
            const backoff = Math.pow(2, attempt + 1) * 1000;
            this.log(`HTTP ${res.status}, retrying in ${backoff}ms...`);
            await delay(getRetryDelayMs(backoff), undefined, { signal: req.signal });
            continue;
          }
          throw new ClientError(`POST /chat/completions failed: ${res.status} ${res.statusText}`, res.status, true);
        }

        if (!res.ok) {
          const text = await res.text().catch(() => '');
          throw new ClientError(
            `POST /chat/completions failed: ${res.status} ${res.statusText}${text ? `\n${text.slice(0, 2000)}` : ''}`,
            res.status
          );
        }

        const out = stream && req.onToken ? await this.readStream(res, req.onToken) : await this.readJson(res);
        this.log(`← ${out.length} chars`);
        return out;
      } catch (e: unknown) {
        throw this.translate(e, url, this.responseTimeoutMs, signal, req.signal);
      } finally {
        done();
      }
    }
  }

  private async readJson(res: Response): Promise<string> {
    let body: unknown;
    try {
      body = await res.json();
    } catch (e: unknown) {
      if (isAbort(e)) throw e;
      throw new ClientError(`invalid JSON from /chat/completions: ${asErr(e).message}`);
    }
    const msg = firstChoice(body)?.message;
    if (!isRecord(msg)) throw new ClientError('response has no choices[0].message');
    return contentText(msg.content);
  }

  /** Accumulate `data:` frames until `[DONE]` or end of body. */
  private async readStream(res: Response, onToken: (t: string) => void): Promise<string> {
    if (!res.body) return '';
    const decoder = new TextDecoder();
    let buf = '';
    let text = '';

    const handleFrame = (frame: string): boolean => {
      for (const line of frame.split('\n')) {
        if (!line.startsWith('data:')) continue;
        const data = line.slice(5).trim();
        if (data === '[DONE]') return true;
        let chunk: unknown;
        try {
          chunk = JSON.parse(data);
        } catch {
          this.log(`skipping unparseable SSE frame (${data.length} chars)`);
          continue;
        }
        const t = deltaText(chunk);
        if (t) {
          text += t;
          onToken(t);
        }
      }
      return false;
    };

    for await (const value of res.body) {
      buf += decoder.decode(value, { stream: true }).replace(/\r\n/g, '\n');
      let idx: number;
      while ((idx = buf.indexOf('\n\n')) !== -1) {
        const frame = buf.slice(0, idx);
        buf = buf.slice(idx + 2);
        if (handleFrame(frame)) return text;
      }
    }
    if (buf.trim()) handleFrame(buf);
    return text;
  }
}

function asErr(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}
