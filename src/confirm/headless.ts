/**
 * HeadlessConfirmProvider: for piped or non-TTY use. Nobody can answer, so
 * every command that needs confirmation is declined.
 */

import { warnTag } from '../term.js';
import type { ConfirmationProvider, ConfirmDecision, ConfirmRequest } from '../types.js';

export class HeadlessConfirmProvider implements ConfirmationProvider {
  async confirm(req: ConfirmRequest): Promise<ConfirmDecision> {
    warnTag('headless', `declined ${req.command} (${req.reason}, no TTY); trust "${req.prefix}" or set auto_confirm_exec=false`);
    return 'no';
  }

  async showBlocked(command: string, reason: string): Promise<void> {
    warnTag('headless', `blocked ${command}: ${reason}`);
  }
}
