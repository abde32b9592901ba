import type { Styler } from '../term.js';
import type { ChatExecutionMode, ConfirmationProvider, Session } from '../types.js';

import type { AppRuntime } from './runtime.js';

export interface ReplContext {
  rt: AppRuntime;
  S: Styler;
  session: Session;
  mode: ChatExecutionMode;
  confirm: ConfirmationProvider & { clearRemembered?(): void };

  print(line: string): void;
  /** Load (or start) the named session and make it current. */
  useSession(name: string): Promise<void>;
  /** Start an empty session under `name`, replacing any stored one. */
  startSession(name: string): Promise<void>;
  shutdown(code: number): Promise<void>;
}
