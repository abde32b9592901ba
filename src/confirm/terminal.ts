/**
 * TerminalConfirmProvider: interactive readline confirmation for shell commands.
 */

import type { Interface as ReadlineInterface } from 'node:readline/promises';

import type { Styler } from '../term.js';
import type { ConfirmationProvider, ConfirmDecision, ConfirmRequest } from '../types.js';

/** Map a typed answer to a decision; anything unrecognised declines. */
export function parseConfirmAnswer(raw: string): ConfirmDecision {
  switch (raw.trim().toLowerCase()) {
    case 'y':
    case 'yes':
      return 'yes';
    case 'a':
    case 'always':
      return 'always';
    case 'q':
    case 'quit':
    case 'stop':
      return 'stop';
    default:
      return 'no';
  }
}

export class TerminalConfirmProvider implements ConfirmationProvider {
  /**
   * Per-process answers keyed by exact command. `always` is not kept here:
   * it goes to the policy store as a trusted prefix.
   */
  private remembered = new Map<string, 'yes' | 'no'>();

  constructor(
    private readonly rl: ReadlineInterface,
    private readonly style: Styler
  ) {}

  async confirm(req: ConfirmRequest): Promise<ConfirmDecision> {
    const prior = this.remembered.get(req.command);
    if (prior) {
      console.error(this.style.dim(`[remembered ${prior === 'yes' ? '✓' : '✗'}] ${req.command}`));
      return prior;
    }

    const prompt = this.boxedPrompt(
      `Run: ${req.command}`,
      `[y]es / [n]o / [a]lways trust "${req.prefix}" / [q] stop batch`
    );
    const ans = parseConfirmAnswer(await this.rl.question(prompt, { signal: req.signal }));
    if (ans === 'yes' || ans === 'no') this.remembered.set(req.command, ans);
    return ans;
  }

  async showBlocked(command: string, reason: string): Promise<void> {
    console.error(`${this.style.red('[blocked]')} ${command}: ${reason}`);
  }

  /** Clear remembered answers (on /new and /clear). */
  clearRemembered(): void {
    this.remembered.clear();
  }

  private boxedPrompt(summary: string, suffix: string): string {
    const maxW = Math.min(process.stdout.columns ?? 80, 80);
    const inner = summary.length > maxW - 6 ? summary.slice(0, maxW - 9) + '...' : summary;
    const border = '─'.repeat(Math.max(inner.length + 2, 20));
    const lines = [`┌${border}┐`, `│ ${inner.padEnd(border.length - 1)}│`, `└${border}┘`];
    return `${lines.join('\n')}\n${suffix} `;
  }
}
