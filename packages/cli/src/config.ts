// packages/cli/src/config.ts
//
// Secrets may come from flags or the environment; flags win.
// The network is resolved by @txcanon/transactions (flag, then TXCANON_NETWORK).

export const SECRET_ENV = 'TXCANON_SECRET';
export const SECOND_SECRET_ENV = 'TXCANON_SECOND_SECRET';

export type Env = Record<string, string | undefined>;

export function resolveSecret(flag: string | undefined, envName: string, env: Env): string | undefined {
  const v = String(flag ?? env[envName] ?? '').trim();
  return v ? v : undefined;
}

export function requireSecret(flag: string | undefined, envName: string, env: Env, flagName: string): string {
  const v = resolveSecret(flag, envName, env);
  if (!v) throw new Error(`missing secret: pass ${flagName} or set ${envName}`);
  return v;
}
