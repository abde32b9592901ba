/** Raised inside a turn when the operator interrupts it; caught by the loop, never by per-tool handlers. */
export class TurnAborted extends Error {
  constructor(message = 'turn aborted') {
    super(message);
    this.name = 'TurnAborted';
  }
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw new TurnAborted();
}
