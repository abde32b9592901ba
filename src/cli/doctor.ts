/**
 * `shellmate doctor`: check that the configured endpoint and key can answer a chat.
 */

import { resolveApiKey } from '../config.js';
import { friendlyError } from '../errors.js';
import { makeMessage } from '../session-store.js';
import type { Styler } from '../term.js';
import type { ChatClient, ModelsResponse, ShellmateConfig } from '../types.js';
import { truncateChars } from '../utils.js';

export type CheckStatus = 'ok' | 'warn' | 'fail';

export type DoctorCheck = {
  name: string;
  status: CheckStatus;
  detail: string;
};

/** What doctor needs from a client; `OpenAIClient` satisfies it. */
export interface DoctorClient extends ChatClient {
  models(signal?: AbortSignal): Promise<ModelsResponse>;
}

export type DoctorDeps = {
  makeClient: (config: ShellmateConfig, apiKey: string) => DoctorClient;
  env?: NodeJS.ProcessEnv;
};

const PING_PROMPT = 'Reply with the single word: ok';

function checkEndpoint(endpoint: string): DoctorCheck {
  let url: URL;
  try {
    url = new URL(endpoint);
  } catch {
    return { name: 'endpoint', status: 'fail', detail: `not a valid URL: ${JSON.stringify(endpoint)}` };
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return { name: 'endpoint', status: 'fail', detail: `unsupported protocol ${url.protocol} in ${endpoint}` };
  }
  return { name: 'endpoint', status: 'ok', detail: endpoint };
}

/**
 * Run the checks in order. A failed endpoint or key check stops the run;
 * `/models` only warns since some servers do not implement it.
 */
export async function runDoctor(config: ShellmateConfig, deps: DoctorDeps): Promise<DoctorCheck[]> {
  const checks: DoctorCheck[] = [];

  const endpoint = checkEndpoint(config.endpoint);
  checks.push(endpoint);
  if (endpoint.status === 'fail') return checks;

  let apiKey: string;
  try {
    apiKey = resolveApiKey(config, deps.env);
    checks.push({ name: 'api key', status: 'ok', detail: `found (${apiKey.length} chars)` });
  } catch (e: unknown) {
    checks.push({ name: 'api key', status: 'fail', detail: friendlyError(e) });
    return checks;
  }

  const client = deps.makeClient(config, apiKey);

  try {
    const res = await client.models();
    const ids = res.data.map((m) => m.id);
    const listed = ids.includes(config.model);
    checks.push({
      name: 'models',
      status: listed ? 'ok' : 'warn',
      detail: listed ? `${ids.length} models, ${config.model} listed` : `${config.model} not among ${ids.length} listed models`,
    });
  } catch (e: unknown) {
    checks.push({ name: 'models', status: 'warn', detail: friendlyError(e) });
  }

  try {
    const reply = await client.chat({
      model: config.model,
      messages: [makeMessage('user', PING_PROMPT)],
    });
    checks.push({ name: 'chat', status: 'ok', detail: `replied: ${truncateChars(reply.trim(), 60)}` });
  } catch (e: unknown) {
    checks.push({ name: 'chat', status: 'fail', detail: friendlyError(e) });
  }

  return checks;
}

export function formatChecks(checks: readonly DoctorCheck[], S: Styler): string[] {
  const mark = (s: CheckStatus) => (s === 'ok' ? S.green('ok  ') : s === 'warn' ? S.yellow('warn') : S.red('FAIL'));
  return checks.map((c) => `${mark(c.status)} ${c.name.padEnd(9)} ${c.detail}`);
}

export function doctorExitCode(checks: readonly DoctorCheck[]): number {
  return checks.some((c) => c.status === 'fail') ? 1 : 0;
}
