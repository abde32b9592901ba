/**
 * Clean-up for captured command output before it goes back to the model.
 */

const ANSI_RE = /\u001b\[[0-9;?]*[A-Za-z]|\u001b\][^\u0007]*\u0007|\u001b[()][AB012]|\u001b[=>Nc7-9]/g;

export function stripAnsi(s: string): string {
  return s.replace(ANSI_RE, '');
}

/** Collapse runs of identical lines into the line plus a repeat count. */
export function collapseRepeats(lines: readonly string[], maxLineLen = 400): string[] {
  const out: string[] = [];
  let prev: string | undefined;
  let repeats = 0;
  const flush = () => {
    if (prev === undefined) return;
    out.push(prev);
    if (repeats > 0) out.push(`[repeated ${repeats} more times]`);
  };

  for (const raw of lines) {
    const line = raw.length > maxLineLen ? raw.slice(0, maxLineLen) + '…' : raw;
    if (line === prev) {
      repeats++;
      continue;
    }
    flush();
    prev = line;
    repeats = 0;
  }
  flush();
  return out;
}

/**
 * Fit `s` into `maxBytes` of UTF-8, keeping the head and the tail (errors
 * usually land at the end) around a marker that names the original size.
 */
export function clipBytes(
  s: string,
  maxBytes: number,
  totalBytes?: number
): { text: string; truncated: boolean } {
  const buf = Buffer.from(s, 'utf8');
  const total = totalBytes ?? buf.length;
  if (buf.length <= maxBytes && total <= buf.length) return { text: s, truncated: false };
  if (buf.length <= maxBytes) {
    return { text: `${s}\n[truncated, ${total} bytes total]`, truncated: true };
  }
  const headLen = Math.floor(maxBytes * 0.6);
  const tailLen = maxBytes - headLen;
  // A multi-byte char split at either cut decodes as U+FFFD.
  const head = buf.subarray(0, headLen).toString('utf8');
  const tail = buf.subarray(buf.length - tailLen).toString('utf8');
  return { text: `${head}\n[truncated, ${total} bytes total]\n${tail}`, truncated: true };
}

/** Full clean-up pipeline for one output stream. */
export function cleanOutput(raw: string, maxBytes: number, totalBytes?: number) {
  const lines = collapseRepeats(stripAnsi(raw).split(/\r?\n/));
  return clipBytes(lines.join('\n').trimEnd(), maxBytes, totalBytes);
}
