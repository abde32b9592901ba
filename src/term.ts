import pc from 'picocolors';

type ColorMode = 'auto' | 'always' | 'never';

export function resolveColorMode(mode: ColorMode): { enabled: boolean } {
  const env = process.env;

  // Standard opt-out
  if ('NO_COLOR' in env) return { enabled: false };

  // Explicit force/disable
  if (env.FORCE_COLOR === '0') return { enabled: false };
  if (env.FORCE_COLOR && env.FORCE_COLOR !== '0') return { enabled: true };

  if (mode === 'always') return { enabled: true };
  if (mode === 'never') return { enabled: false };

  return { enabled: !!process.stdout.isTTY };
}

export type Styler = {
  enabled: boolean;
  dim: (s: string) => string;
  bold: (s: string) => string;
  red: (s: string) => string;
  yellow: (s: string) => string;
  green: (s: string) => string;
  cyan: (s: string) => string;
  magenta: (s: string) => string;
  blue: (s: string) => string;
};

export function makeStyler(enabled: boolean): Styler {
  const wrap = (fn: (s: string) => string) => (s: string) => (enabled ? fn(s) : s);
  return {
    enabled,
    dim: wrap(pc.dim),
    bold: wrap(pc.bold),
    red: wrap(pc.red),
    yellow: wrap(pc.yellow),
    green: wrap(pc.green),
    cyan: wrap(pc.cyan),
    magenta: wrap(pc.magenta),
    blue: wrap(pc.blue),
  };
}

/** Styler for stderr diagnostics; color follows stderr's TTY state. */
let diagStyler: Styler | undefined;
function diag(): Styler {
  if (!diagStyler) {
    const env = process.env;
    const forced = env.FORCE_COLOR && env.FORCE_COLOR !== '0';
    const enabled = !('NO_COLOR' in env) && env.FORCE_COLOR !== '0' && (Boolean(forced) || !!process.stderr.isTTY);
    diagStyler = makeStyler(enabled);
  }
  return diagStyler;
}

/** Tagged diagnostic line on stderr: `[tag] msg`. */
export function logTag(tag: string, msg: string): void {
  console.error(`${diag().dim(`[${tag}]`)} ${msg}`);
}

export function warnTag(tag: string, msg: string): void {
  console.error(`${diag().yellow(`[${tag}]`)} ${msg}`);
}

export function banner(title: string, s: Styler): string {
  return s.blue(s.bold(title));
}

export function warn(msg: string, s: Styler): string {
  return s.yellow('WARN') + s.dim(': ') + msg;
}

export function err(msg: string, s: Styler): string {
  return s.red('ERROR') + s.dim(': ') + msg;
}
