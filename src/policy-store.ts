/**
 * PolicyStore: the one place the auto-exec policy is mutated.
 *
 * Readers take an immutable snapshot and pass it to `decide`. Writers are queued
 * on a promise chain so only one mutation (read-modify-persist) runs at a time;
 * sessions sharing a store see each other's trusted prefixes immediately.
 *
 * Each mutation re-reads the stored lists, applies its change to them and
 * writes back only the key it changed, so other processes sharing the config
 * file keep their entries. Mode and confirm are never refreshed from storage:
 * the live values may come from the environment or flags.
 */

import { logTag } from './term.js';
import type { AutoExecMode, AutoExecPolicy } from './types.js';
import { normalizeWhitespace } from './utils.js';

/** Some policy keys; a missing key is not stored, or not being changed. */
export type PolicyPatch = Partial<AutoExecPolicy>;

export interface PolicyPersistence {
  /** The policy keys currently stored. */
  load(): Promise<PolicyPatch>;
  /** Store the keys in `patch`, leaving every other stored key as it is. */
  save(patch: PolicyPatch): Promise<void>;
}

type ListKey = 'allow' | 'deny' | 'trusted';

function freeze(p: AutoExecPolicy): Readonly<AutoExecPolicy> {
  return Object.freeze({
    mode: p.mode,
    confirm: p.confirm,
    allow: Object.freeze([...p.allow]),
    deny: Object.freeze([...p.deny]),
    trusted: Object.freeze([...p.trusted]),
  });
}

function listPatch(key: ListKey, list: string[]): PolicyPatch {
  switch (key) {
    case 'allow':
      return { allow: list };
    case 'deny':
      return { deny: list };
    case 'trusted':
      return { trusted: list };
  }
}

function withStoredLists(p: Readonly<AutoExecPolicy>, stored: PolicyPatch): AutoExecPolicy {
  return {
    ...p,
    allow: stored.allow ?? p.allow,
    deny: stored.deny ?? p.deny,
    trusted: stored.trusted ?? p.trusted,
  };
}

export class PolicyStore {
  private current: Readonly<AutoExecPolicy>;
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  constructor(
    initial: AutoExecPolicy,
    private readonly persistence?: PolicyPersistence,
    private readonly verbose = false
  ) {
    this.current = freeze(initial);
  }

  /** Immutable view of the policy as of now. */
  snapshot(): Readonly<AutoExecPolicy> {
    return this.current;
  }

  /** Number of mutations queued or running. */
  get queued(): number {
    return this.pending;
  }

  /** Pick up list entries other processes have stored since the last mutation. */
  async refresh(): Promise<void> {
    await this.mutate('refresh', () => null);
  }

  trustPrefix(prefix: string): Promise<boolean> {
    return this.addEntry('trusted', prefix);
  }

  untrustPrefix(prefix: string): Promise<boolean> {
    return this.removeEntry('trusted', prefix);
  }

  addAllow(prefix: string): Promise<boolean> {
    return this.addEntry('allow', prefix);
  }

  removeAllow(prefix: string): Promise<boolean> {
    return this.removeEntry('allow', prefix);
  }

  addDeny(prefix: string): Promise<boolean> {
    return this.addEntry('deny', prefix);
  }

  removeDeny(prefix: string): Promise<boolean> {
    return this.removeEntry('deny', prefix);
  }

  setMode(mode: AutoExecMode): Promise<boolean> {
    return this.mutate(`mode=${mode}`, (p) => (p.mode === mode ? null : { mode }));
  }

  setConfirm(confirm: boolean): Promise<boolean> {
    return this.mutate(`confirm=${confirm}`, (p) => (p.confirm === confirm ? null : { confirm }));
  }

  private addEntry(key: ListKey, raw: string): Promise<boolean> {
    const entry = normalizeWhitespace(raw);
    if (!entry) return Promise.resolve(false);
    return this.mutate(`${key} += ${entry}`, (p) =>
      p[key].includes(entry) ? null : listPatch(key, [...p[key], entry])
    );
  }

  private removeEntry(key: ListKey, raw: string): Promise<boolean> {
    const entry = normalizeWhitespace(raw);
    return this.mutate(`${key} -= ${entry}`, (p) =>
      p[key].includes(entry) ? listPatch(key, p[key].filter((x) => x !== entry)) : null
    );
  }

  /**
   * Queue a mutation. `change` sees the latest policy, with lists as stored,
   * and returns the keys to change, or null for no-op. Resolves true when
   * something changed. A persistence failure rejects and leaves the in-memory
   * policy untouched.
   */
  private async mutate(label: string, change: (p: Readonly<AutoExecPolicy>) => PolicyPatch | null): Promise<boolean> {
    this.pending += 1;
    const waitFor = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    try {
      await waitFor;
      const stored = this.persistence ? await this.persistence.load() : {};
      const base = withStoredLists(this.current, stored);
      const patch = change(base);
      if (!patch) {
        this.current = freeze(base);
        return false;
      }
      if (this.persistence) await this.persistence.save(patch);
      this.current = freeze({ ...base, ...patch });
      if (this.verbose) logTag('policy', label);
      return true;
    } finally {
      this.pending = Math.max(0, this.pending - 1);
      release();
    }
  }
}
