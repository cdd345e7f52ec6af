import { Logger } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { randomBytes } from 'crypto';
import {
  secrets as secretConstants,
  tokenLifetime,
} from '../../common/constants/app.constants';
import {
  InvalidDurationError,
  assertDuration,
  parseDuration,
} from '../../common/utils/duration';
import { Settings } from '../settings/interfaces/settings.interface';
import { SettingsRepository } from '../settings/repositories/settings.repository';
import { UserRecord } from '../users/interfaces/user-record.interface';
import { UserRepository } from '../users/repositories/user.repository';
import { TokenScope } from './enums/token-scope.enum';
import { JwtClaims, isJwtClaims } from './interfaces/jwt-claims.interface';
import {
  IssuedToken,
  TokenData,
  TokenRecord,
} from './interfaces/token-data.interface';
import {
  InvalidScopeError,
  InvalidTokenError,
  SecretGenerationError,
  TokenIssuanceError,
  TokenRejection,
} from './token.errors';
import { peekScope } from './utils/peek-scope';

/** Must return cryptographically secure random bytes. */
export type KeyGenerator = (size: number) => Buffer;

export type SecretTable = Readonly<Record<TokenScope, Buffer>>;

export interface TokenServiceOptions {
  sessionDuration: string;
  jwtService: JwtService;
  settingsRepository: SettingsRepository;
  userRepository: UserRepository;
  generateKey?: KeyGenerator;
}

type VerificationResult =
  | { valid: true; data: TokenRecord }
  | { valid: false; rejection: TokenRejection };

function generateSecret(generateKey: KeyGenerator): Buffer {
  let key: Buffer;
  try {
    key = generateKey(secretConstants.KEY_SIZE_BYTES);
  } catch (error) {
    throw new SecretGenerationError({ cause: error });
  }
  if (key.length !== secretConstants.KEY_SIZE_BYTES) {
    throw new SecretGenerationError();
  }
  return key;
}

/**
 * Issues and verifies HS256 session tokens.
 *
 * Each scope signs with its own secret. The default-scope secret lives only
 * in this process, so a restart invalidates every default-scope token. The
 * kubeconfig-scope secret is persisted in settings and survives restarts.
 */
export class TokenService {
  private readonly logger = new Logger(TokenService.name);

  private constructor(
    private readonly secrets: SecretTable,
    private sessionDurationMs: number,
    private readonly jwtService: JwtService,
    private readonly settingsRepository: SettingsRepository,
    private readonly userRepository: UserRepository,
  ) {}

  /**
   * Builds the secret table: a fresh default-scope secret, and the persisted
   * kubeconfig-scope secret (created and stored on first boot).
   */
  static async create(options: TokenServiceOptions): Promise<TokenService> {
    const sessionDurationMs = parseDuration(options.sessionDuration);
    const generateKey = options.generateKey ?? randomBytes;

    const secret = generateSecret(generateKey);
    const kubeSecret = await TokenService.getOrCreateKubeSecret(
      options.settingsRepository,
      generateKey,
    );

    return new TokenService(
      {
        [TokenScope.DEFAULT]: secret,
        [TokenScope.KUBECONFIG]: kubeSecret,
      },
      sessionDurationMs,
      options.jwtService,
      options.settingsRepository,
      options.userRepository,
    );
  }

  private static async getOrCreateKubeSecret(
    settingsRepository: SettingsRepository,
    generateKey: KeyGenerator,
  ): Promise<Buffer> {
    const settings = await settingsRepository.read();
    if (settings.kubeSecretKey) {
      return settings.kubeSecretKey;
    }

    const kubeSecret = generateSecret(generateKey);
    await settingsRepository.update({ ...settings, kubeSecretKey: kubeSecret });
    new Logger(TokenService.name).log('Generated kubeconfig signing secret');

    return kubeSecret;
  }

  /**
   * Issues a default-scope session token that expires after the configured
   * session duration.
   */
  async issueToken(data: TokenData): Promise<IssuedToken> {
    const expiresAt = new Date(Date.now() + this.sessionDurationMs);
    return this.issueTokenForScope(data, TokenScope.DEFAULT, expiresAt);
  }

  /**
   * Issues a kubeconfig-scope token whose lifetime comes from
   * `settings.kubeconfigExpiry` ("0" for no expiry).
   */
  async issueKubeconfigToken(data: TokenData): Promise<IssuedToken> {
    const settings = await this.readSettings();

    let expiryMs: number;
    try {
      expiryMs = parseDuration(settings.kubeconfigExpiry, { allowZero: true });
    } catch (error) {
      if (error instanceof InvalidDurationError) {
        throw new TokenIssuanceError('invalid kubeconfig expiry', error);
      }
      throw error;
    }

    const expiresAt = expiryMs === 0 ? null : new Date(Date.now() + expiryMs);
    return this.issueTokenForScope(data, TokenScope.KUBECONFIG, expiresAt);
  }

  /**
   * Signs a token for an explicit scope. A null `expiresAt` omits the `exp`
   * claim; such tokens are still subject to the user's revocation timestamp.
   * In embedded client mode the expiry is always pushed out 99 years.
   */
  async issueTokenForScope(
    data: TokenData,
    scope: TokenScope,
    expiresAt: Date | null,
  ): Promise<IssuedToken> {
    const secret: Buffer | undefined = this.secrets[scope];
    if (!secret) {
      throw new InvalidScopeError(scope);
    }

    const settings = await this.readSettings();

    const now = Date.now();
    let effectiveExpiry = expiresAt;
    if (settings.isEmbeddedClient) {
      this.logger.log('detected embedded client mode');
      effectiveExpiry = new Date(
        now + tokenLifetime.EMBEDDED_CLIENT_YEARS * tokenLifetime.YEAR_MS,
      );
    }

    const claims: JwtClaims = {
      id: data.id,
      username: data.username,
      role: data.role,
      scope,
      forceChangePassword: data.forceChangePassword,
      iat: Math.floor(now / 1000),
      ...(effectiveExpiry
        ? { exp: Math.floor(effectiveExpiry.getTime() / 1000) }
        : {}),
    };

    let token: string;
    try {
      token = this.jwtService.sign(claims, { secret, algorithm: 'HS256' });
    } catch (error) {
      throw new TokenIssuanceError('failed signing token', error);
    }

    return { token, expiresAt: effectiveExpiry };
  }

  /**
   * Verifies signature, expiry and revocation. Every failure surfaces as the
   * same InvalidTokenError; the cause is only logged.
   */
  async verifyToken(token: string): Promise<TokenRecord> {
    const result = await this.evaluate(token);
    if (!result.valid) {
      this.logger.debug(`token rejected: ${result.rejection.reason}`);
      throw new InvalidTokenError();
    }
    return result.data;
  }

  /**
   * Changes the lifetime of tokens issued from now on. Rejects values that
   * are not a positive, finite number of milliseconds.
   */
  setSessionDuration(durationMs: number): void {
    this.sessionDurationMs = assertDuration(durationMs, String(durationMs));
  }

  getSessionDuration(): number {
    return this.sessionDurationMs;
  }

  private async evaluate(token: string): Promise<VerificationResult> {
    const scope = peekScope(token);
    const secret = this.secrets[scope];

    let payload: object;
    try {
      payload = this.jwtService.verify<object>(token, {
        secret,
        algorithms: ['HS256'],
      });
    } catch (error) {
      return { valid: false, rejection: TokenRejection.fromVerifyError(error) };
    }

    if (!isJwtClaims(payload) || payload.scope !== scope) {
      return {
        valid: false,
        rejection: new TokenRejection('claims', 'unexpected token claims'),
      };
    }

    let user: UserRecord;
    try {
      user = await this.userRepository.read(payload.id);
    } catch (error) {
      return {
        valid: false,
        rejection: new TokenRejection('user_lookup', 'user lookup failed', {
          cause: error,
        }),
      };
    }

    if (user.tokenIssueAt > payload.iat) {
      return {
        valid: false,
        rejection: new TokenRejection(
          'revoked',
          'token issued before credentials were invalidated',
        ),
      };
    }

    return {
      valid: true,
      data: {
        id: payload.id,
        username: payload.username,
        role: payload.role,
        forceChangePassword: payload.forceChangePassword,
        token,
      },
    };
  }

  private async readSettings(): Promise<Settings> {
    try {
      return await this.settingsRepository.read();
    } catch (error) {
      throw new TokenIssuanceError('failed fetching settings from store', error);
    }
  }
}
