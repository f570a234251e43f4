/**
 * Stderr logging. Stdout belongs to the MCP stdio transport, so every
 * diagnostic goes through console.error.
 */

export type LogLevel = 'info' | 'warn' | 'error';

export type LogComponent =
  | 'server' | 'config' | 'loader' | 'graph' | 'suggest'
  | 'analysis' | 'linker' | 'backup' | 'semantic';

export function log(component: LogComponent, message: string, level: LogLevel = 'info'): void {
  const prefix = level === 'error'
    ? '[vault-linker] ERROR'
    : level === 'warn' ? '[vault-linker] WARN' : '[vault-linker]';
  console.error(`${prefix} [${component}] ${message}`);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
