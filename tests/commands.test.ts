import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, it, beforeEach, afterEach } from 'node:test';

import { DEFAULTS, policyFromConfig } from '../src/config.js';
import { PolicyStore } from '../src/policy-store.js';
import { SessionStore, makeMessage, newSession } from '../src/session-store.js';
import { dispatchSlash } from '../src/cli/repl.js';
import type { ReplContext } from '../src/cli/repl-context.js';
import type { AppRuntime } from '../src/cli/runtime.js';
import { makeStyler } from '../src/term.js';
import type { ConfirmDecision } from '../src/types.js';

class FakeConfirm {
  cleared = 0;

  async confirm(): Promise<ConfirmDecision> {
    return 'no';
  }

  clearRemembered(): void {
    this.cleared++;
  }
}

type Harness = { ctx: ReplContext; out: string[]; confirm: FakeConfirm; shutdowns: number[] };

function harness(rt: AppRuntime, sessionId: string): Harness {
  const out: string[] = [];
  const shutdowns: number[] = [];
  const confirm = new FakeConfirm();
  const ctx: ReplContext = {
    rt,
    S: rt.S,
    session: newSession(sessionId),
    mode: 'agent-auto',
    confirm,
    print: (line) => out.push(line),
    async useSession(name) {
      await rt.sessions.save(ctx.session);
      ctx.session = await rt.sessions.load(name);
    },
    async startSession(name) {
      await rt.sessions.save(ctx.session);
      ctx.session = newSession(name);
      await rt.sessions.save(ctx.session);
    },
    async shutdown(code) {
      await rt.sessions.save(ctx.session);
      shutdowns.push(code);
    },
  };
  return { ctx, out, confirm, shutdowns };
}

describe('slash commands', () => {
  let dir: string;
  let rt: AppRuntime;
  let h: Harness;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'shellmate-cmd-'));
    rt = {
      config: DEFAULTS,
      configPath: path.join(dir, 'config.json'),
      cwd: dir,
      sessions: new SessionStore({ dir: path.join(dir, 'sessions'), budget: { maxMessages: 50, maxChars: 100000 } }),
      policy: new PolicyStore(policyFromConfig(DEFAULTS)),
      S: makeStyler(false),
    };
    h = harness(rt, 's1');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  const run = async (line: string): Promise<string[]> => {
    h.out.length = 0;
    assert.equal(await dispatchSlash(h.ctx, line), true);
    return [...h.out];
  };

  it('leaves plain input for the model', async () => {
    assert.equal(await dispatchSlash(h.ctx, 'hello /policy'), false);
    assert.deepEqual(h.out, []);
  });

  it('reports unknown commands', async () => {
    assert.deepEqual(await run('/xyz arg'), ['unknown command /xyz; try /help']);
  });

  it('/help lists every command once', async () => {
    const lines = await run('/help');
    assert.equal(lines.length, 12);
    assert.ok(lines.some((l) => l.startsWith('/exit ')));
    assert.ok(!lines.some((l) => l.startsWith('/quit')));
  });

  it('/policy shows and changes the policy', async () => {
    assert.deepEqual(await run('/policy'), [
      'mode: safe\nconfirm: on\nallow: (none)\ndeny: (none)\ntrusted: (none)',
    ]);
    assert.deepEqual(await run('/policy mode all'), ['auto_exec_mode=all']);
    assert.deepEqual(await run('/policy allow npm test'), ['"npm test" allowed']);
    assert.deepEqual(await run('/policy allow npm test'), ['no change for "npm test"']);
    assert.deepEqual(await run('/policy deny rm'), ['"rm" denied']);
    assert.deepEqual(await run('/policy undeny rm'), ['"rm" removed from deny list']);
    assert.deepEqual(await run('/policy confirm off'), ['auto_confirm_exec=off']);

    const p = rt.policy.snapshot();
    assert.equal(p.mode, 'all');
    assert.deepEqual([...p.allow], ['npm test']);
    assert.deepEqual([...p.deny], []);
    assert.equal(p.confirm, false);
  });

  it('/policy prints usage for bad input', async () => {
    assert.deepEqual(await run('/policy mode yolo'), ['usage: /policy mode safe|all|custom']);
    assert.deepEqual(await run('/policy confirm maybe'), ['usage: /policy confirm on|off']);
    const [usage] = await run('/policy allow');
    assert.ok(usage?.startsWith('usage: /policy show|mode <safe|all|custom>|allow <p>'));
  });

  it('/mode shows and switches routing', async () => {
    assert.deepEqual(await run('/mode'), ['execution mode: agent-auto']);
    assert.deepEqual(await run('/mode chat-only'), ['execution mode: chat']);
    assert.equal(h.ctx.mode, 'chat');
    assert.deepEqual(await run('/mode turbo'), ['usage: /mode show|chat|agent-auto|agent-force']);
    assert.equal(h.ctx.mode, 'chat');
  });

  it('/history shows first lines of recent messages', async () => {
    assert.deepEqual(await run('/history'), ['(empty)']);
    h.ctx.session.messages.push(makeMessage('user', 'hello\nsecond line'), makeMessage('assistant', 'hi'));
    assert.deepEqual(await run('/history 1'), ['assistant hi']);
    assert.deepEqual(await run('/history'), ['user      hello', 'assistant hi']);
  });

  it('/clear empties and saves the session', async () => {
    h.ctx.session.messages.push(makeMessage('user', 'hello'));
    assert.deepEqual(await run('/clear'), ['cleared session s1']);
    assert.equal(h.ctx.session.messages.length, 0);
    assert.equal(h.confirm.cleared, 1);
    assert.deepEqual((await rt.sessions.load('s1')).messages, []);
  });

  it('/compact reports the budget', async () => {
    h.ctx.session.messages.push(makeMessage('user', 'hello'), makeMessage('assistant', 'hi'));
    assert.deepEqual(await run('/compact'), ['compacted: 2 → 2 messages (budget 50 msgs / 100000 chars)']);
  });

  it('/session lists, switches and removes sessions', async () => {
    assert.deepEqual(await run('/session list'), ['no stored sessions']);

    assert.deepEqual(await run('/session use other'), ['using session other (0 messages)']);
    assert.equal(h.ctx.session.id, 'other');

    const listed = await run('/session');
    assert.equal(listed.length, 1);
    assert.ok(listed[0]?.startsWith('  s1  '));

    assert.deepEqual(await run('/session rm other'), [
      'cannot remove the active session; switch with /new or /session use first',
    ]);
    assert.deepEqual(await run('/session use s1'), ['using session s1 (0 messages)']);
    assert.deepEqual(await run('/session rm other'), ['removed session other']);
    assert.deepEqual(await run('/session rm ghost'), ['no session named ghost']);
    assert.deepEqual(await run('/session use'), ['usage: /session use <name>']);
    assert.deepEqual(await run('/session frob x'), ['usage: /session list|use <name>|rm <name>']);
  });

  it('/new starts an empty named session', async () => {
    h.ctx.session.messages.push(makeMessage('user', 'hello'));
    assert.deepEqual(await run('/new fresh start'), ['new session: fresh']);
    assert.equal(h.ctx.session.id, 'fresh');
    assert.equal(h.ctx.session.messages.length, 0);
    assert.equal(h.confirm.cleared, 1);
    assert.equal((await rt.sessions.load('s1')).messages.length, 1);
  });

  it('/exit and /quit shut down with code 0', async () => {
    await run('/exit');
    await run('/QUIT');
    assert.deepEqual(h.shutdowns, [0, 0]);
  });

  it('prints command errors instead of throwing', async () => {
    await fs.writeFile(path.join(dir, 'sessions'), 'not a directory');
    const [line] = await run('/session list');
    assert.ok(line?.startsWith('ERROR: /session: ENOTDIR'));
  });

  describe('file commands', () => {
    beforeEach(async () => {
      await fs.mkdir(path.join(dir, 'ws', 'sub'), { recursive: true });
      await fs.writeFile(path.join(dir, 'ws', 'a.txt'), 'Alpha line\n  needle here  \n');
      await fs.writeFile(path.join(dir, 'ws', 'sub', 'b.md'), 'NEEDLE again');
    });

    it('/read keeps the file out of the terminal and in the session', async () => {
      assert.deepEqual(await run('/read ws/a.txt'), [
        'Read ws/a.txt (content hidden). Ask a follow-up question to analyze it.',
      ]);
      const msgs = h.ctx.session.messages;
      assert.deepEqual(
        msgs.map((m) => [m.role, m.content]),
        [
          ['user', '/read ws/a.txt'],
          ['tool', 'tool[fs.read] output:\nAlpha line\n  needle here  \n'],
        ],
      );
      assert.equal((await rt.sessions.load('s1')).messages.length, 2);
    });

    it('/ls lists files under the path', async () => {
      assert.deepEqual(await run('/ls ws'), ['ws/a.txt\nws/sub/b.md']);
      assert.equal(h.ctx.session.messages[1]?.content, 'tool[fs.list] output:\nws/a.txt\nws/sub/b.md');
    });

    it('/grep matches case-insensitively', async () => {
      assert.deepEqual(await run('/grep needle ws'), ['ws/a.txt:2:needle here\nws/sub/b.md:1:NEEDLE again']);
      assert.deepEqual(await run('/grep zebra ws'), ['No matches found.']);
      assert.equal(h.ctx.session.messages[3]?.content, 'tool[fs.grep] output:\nNo matches found.');
    });

    it('prints usage and missing paths', async () => {
      assert.deepEqual(await run('/read'), ['usage: /read <file>']);
      assert.deepEqual(await run('/grep'), ['usage: /grep <pattern> [path]']);
      assert.deepEqual(await run('/ls nowhere'), ['ERROR: /ls: path does not exist: nowhere']);
      assert.equal(h.ctx.session.messages.length, 0);
    });
  });
});
