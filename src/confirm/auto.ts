/**
 * AutoApproveProvider: answers `yes` to every command the policy sends for
 * confirmation. Denied commands never reach it.
 */

import type { ConfirmationProvider, ConfirmDecision, ConfirmRequest } from '../types.js';

export class AutoApproveProvider implements ConfirmationProvider {
  async confirm(_req: ConfirmRequest): Promise<ConfirmDecision> {
    return 'yes';
  }
}
