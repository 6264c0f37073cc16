/**
 * Logger for agent-clients.
 *
 * All output goes to stderr so stdout stays clean for JSON output.
 * Set AGENT_CLIENTS_QUIET=1 to silence it.
 */

// ── Core write ──────────────────────────────────────────────

function write(message: string): void {
  if (process.env['AGENT_CLIENTS_QUIET'] === '1') return;
  process.stderr.write(message + '\n');
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

export function client(message: string): void {
  write(`🧠 ${message}`);
}

export function registry(message: string): void {
  write(`🌐 ${message}`);
}

export function ready(message: string): void {
  write(`✅ ${message}`);
}
