/**
 * The MCP transport owns stdout; anything else printed there breaks the
 * JSON-RPC stream. Send console.log/info/debug to stderr instead.
 */

function toStderr(...args: unknown[]): void {
  console.error(...args);
}

for (const method of ['log', 'info', 'debug'] as const) {
  if (console[method] !== toStderr) console[method] = toStderr;
}
