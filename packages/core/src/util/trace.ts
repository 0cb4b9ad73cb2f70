/**
 * Diagnostic trace events emitted by generators.
 *
 * Tracing is off by default. When enabled without an `onTrace` callback,
 * events are written to stderr as single `[leaprand] …` lines.
 */

export type TraceEvent =
  | { kind: 'seed'; generator: string; lanes: readonly number[] }
  | { kind: 'default-seed'; generator: string }
  | { kind: 'bad-state'; generator: string; source: 'seed' | 'set-state' }
  | {
      kind: 'jump';
      generator: string;
      steps: bigint;
      compositions: number;
    }
  | { kind: 'set-state'; generator: string; words: readonly number[] };

export type TraceSink = (event: TraceEvent) => void;

export function formatTraceEvent(event: TraceEvent): string {
  switch (event.kind) {
    case 'seed':
      return `[leaprand] ${event.generator} seed: ${JSON.stringify(event.lanes)}`;
    case 'default-seed':
      return `[leaprand] ${event.generator} used before seed(); applying default seed`;
    case 'bad-state':
      return `[leaprand] ${event.generator} ${event.source}: degenerate lane replaced`;
    case 'jump':
      return `[leaprand] ${event.generator} jump: n=${event.steps.toString()} compositions=${event.compositions}`;
    case 'set-state':
      return `[leaprand] ${event.generator} setState: ${JSON.stringify(event.words)}`;
  }
}

export function stderrSink(event: TraceEvent): void {
  process.stderr.write(`${formatTraceEvent(event)}\n`);
}

/**
 * Pick the sink for a generator: the caller's callback wins, then stderr
 * when tracing is enabled, otherwise nothing.
 */
export function resolveTraceSink(
  trace: boolean,
  onTrace?: TraceSink
): TraceSink | undefined {
  if (onTrace) return onTrace;
  return trace ? stderrSink : undefined;
}
