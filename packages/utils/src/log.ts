// packages/utils/src/log.ts
//
// DEBUG=1 (or DEBUG=*) enables every scope; DEBUG=tx,cli enables only those.

function debugScopes(): string[] {
  const raw = String(process.env.DEBUG ?? '').trim();
  if (!raw) return [];
  return raw.split(',').map((s) => s.trim()).filter(Boolean);
}

export function debugEnabled(scope?: string): boolean {
  const scopes = debugScopes();
  if (scopes.length === 0) return false;
  if (scopes.includes('1') || scopes.includes('*') || scopes.includes('true')) return true;
  return scope ? scopes.includes(scope) : false;
}

export function debugLog(scope: string, ...args: unknown[]): void {
  if (debugEnabled(scope)) console.log(`[${scope}]`, ...args);
}
