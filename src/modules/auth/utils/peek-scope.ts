import { decode } from 'jsonwebtoken';
import { TokenScope } from '../enums/token-scope.enum';

/**
 * Reads the `scope` claim of a token WITHOUT verifying its signature, so the
 * verifier knows which secret to check the signature against.
 *
 * The result only ever selects between the members of TokenScope, and the
 * verified claims must carry the same scope afterwards. Anything that is not
 * exactly the kubeconfig scope, including undecodable input, routes to the
 * default scope.
 */
export function peekScope(token: string): TokenScope {
  let payload: ReturnType<typeof decode>;
  try {
    payload = decode(token, { json: true });
  } catch {
    return TokenScope.DEFAULT;
  }

  if (
    payload !== null &&
    typeof payload === 'object' &&
    payload['scope'] === TokenScope.KUBECONFIG
  ) {
    return TokenScope.KUBECONFIG;
  }
  return TokenScope.DEFAULT;
}
