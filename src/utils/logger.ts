/**
 * Live execution logger for shelfscan.
 *
 * All output goes to stderr so stdout stays free for the dashboard frame
 * and the run summary. Emoji prefixes give instant visual context.
 */

// ── Sink ────────────────────────────────────────────────────

export type LogSink = (line: string) => void;

function stderrSink(line: string): void {
  process.stderr.write(line + '\n');
}

let sink: LogSink = stderrSink;

/** Redirect every log line. Pass nothing to restore stderr. */
export function setLogSink(next?: LogSink): void {
  sink = next ?? stderrSink;
}

function write(message: string): void {
  sink(message);
}

// ── Public API ──────────────────────────────────────────────

export function info(message: string): void {
  write(`ℹ️  ${message}`);
}

export function detail(message: string): void {
  write(`   ${message}`);
}

export function section(title: string): void {
  write(`\n${'─'.repeat(50)}`);
  write(`▶  ${title}`);
  write(`${'─'.repeat(50)}`);
}

export function warn(message: string): void {
  write(`⚠️  ${message}`);
}

export function error(message: string): void {
  write(`💥 ${message}`);
}

export function stage(name: string, message: string): void {
  write(`📋 [${name}] ${message}`);
}

export function challenge(message: string): void {
  write(`🛑 ${message}`);
}

export function saved(count: number, path: string): void {
  write(`💾 Saved ${String(count)} listings to ${path}`);
}

export function offer(message: string): void {
  write(`🏷️  ${message}`);
}
