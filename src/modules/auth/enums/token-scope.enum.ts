/**
 * Selects the signing secret and lifetime policy of a token. Every member
 * must have exactly one secret in the TokenService secret table.
 */
export enum TokenScope {
  DEFAULT = 'default',
  KUBECONFIG = 'kubeconfig',
}

const tokenScopes: readonly string[] = Object.values(TokenScope);

export const isTokenScope = (value: unknown): value is TokenScope =>
  typeof value === 'string' && tokenScopes.includes(value);
