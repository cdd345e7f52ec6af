import { TokenScope, isTokenScope } from '../enums/token-scope.enum';

export interface JwtClaims {
  id: number; // User ID
  username: string;
  role: number;
  scope: TokenScope;
  forceChangePassword: boolean;
  iat: number; // Issued at
  exp?: number; // Expires at; absent for tokens that never expire
}

const isInteger = (value: unknown): value is number =>
  typeof value === 'number' && Number.isInteger(value);

export function isJwtClaims(value: unknown): value is JwtClaims {
  if (value === null || typeof value !== 'object') return false;
  return (
    'id' in value &&
    isInteger(value.id) &&
    'username' in value &&
    typeof value.username === 'string' &&
    'role' in value &&
    isInteger(value.role) &&
    'scope' in value &&
    isTokenScope(value.scope) &&
    'forceChangePassword' in value &&
    typeof value.forceChangePassword === 'boolean' &&
    'iat' in value &&
    typeof value.iat === 'number' &&
    (!('exp' in value) || typeof value.exp === 'number')
  );
}
