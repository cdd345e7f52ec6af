import {
  InternalServerErrorException,
  ServiceUnavailableException,
  UnauthorizedException,
} from '@nestjs/common';

export const INVALID_TOKEN_MESSAGE = 'Invalid JWT token';

export class SecretGenerationError extends Error {
  constructor(options?: { cause?: unknown }) {
    super('Unable to generate secret key', options);
    this.name = 'SecretGenerationError';
  }
}

export class InvalidScopeError extends InternalServerErrorException {
  constructor(readonly scope: string) {
    super(`invalid scope: ${scope}`);
  }
}

/**
 * Issuance could not complete. Surfaces to clients as the authentication
 * system being unavailable.
 */
export class TokenIssuanceError extends ServiceUnavailableException {
  constructor(message: string, cause: unknown) {
    super(message, { cause });
  }
}

/** The only error verification ever surfaces. */
export class InvalidTokenError extends UnauthorizedException {
  constructor() {
    super(INVALID_TOKEN_MESSAGE);
  }
}

export type TokenRejectionReason =
  | 'malformed'
  | 'algorithm'
  | 'signature'
  | 'expired'
  | 'claims'
  | 'user_lookup'
  | 'revoked';

/**
 * Internal cause of a failed verification. Logged, never returned to the
 * caller: the public boundary maps every rejection to InvalidTokenError.
 */
export class TokenRejection extends Error {
  constructor(
    readonly reason: TokenRejectionReason,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'TokenRejection';
  }

  static fromVerifyError(error: unknown): TokenRejection {
    if (!(error instanceof Error)) {
      return new TokenRejection('malformed', String(error), { cause: error });
    }
    if (error.name === 'TokenExpiredError') {
      return new TokenRejection('expired', error.message, { cause: error });
    }
    if (error.message === 'invalid signature') {
      return new TokenRejection('signature', error.message, { cause: error });
    }
    if (error.message === 'invalid algorithm') {
      return new TokenRejection('algorithm', error.message, { cause: error });
    }
    return new TokenRejection('malformed', error.message, { cause: error });
  }
}
