import { BadRequestException, Inject, Injectable } from '@nestjs/common';
import { AppLoggerService } from '../../common/services/app-logger.service';
import {
  InvalidDurationError,
  parseDuration,
} from '../../common/utils/duration';
import { TokenService } from '../auth/token.service';
import {
  SETTINGS_REPOSITORY,
  SettingsRepository,
} from './repositories/settings.repository';

function parseOrReject(
  value: string,
  options?: { allowZero?: boolean },
): number {
  try {
    return parseDuration(value, options);
  } catch (error) {
    if (error instanceof InvalidDurationError) {
      throw new BadRequestException(error.message);
    }
    throw error;
  }
}

/**
 * Administrative updates to the settings the token policy reads.
 */
@Injectable()
export class SettingsService {
  constructor(
    @Inject(SETTINGS_REPOSITORY)
    private readonly settingsRepository: SettingsRepository,
    private readonly tokenService: TokenService,
    private readonly appLogger: AppLoggerService,
  ) {}

  /**
   * Persists a new session duration and applies it to tokens issued from now
   * on. Tokens already issued keep their expiry.
   */
  async updateUserSessionTimeout(duration: string): Promise<void> {
    const durationMs = parseOrReject(duration);

    const settings = await this.settingsRepository.read();
    await this.settingsRepository.update({
      ...settings,
      userSessionTimeout: duration,
    });
    this.tokenService.setSessionDuration(durationMs);

    this.appLogger.log(`User session timeout set to ${duration}`, {
      durationMs,
    });
  }

  async updateKubeconfigExpiry(duration: string): Promise<void> {
    parseOrReject(duration, { allowZero: true });

    const settings = await this.settingsRepository.read();
    await this.settingsRepository.update({
      ...settings,
      kubeconfigExpiry: duration,
    });
  }

  async setEmbeddedClientMode(enabled: boolean): Promise<void> {
    const settings = await this.settingsRepository.read();
    await this.settingsRepository.update({
      ...settings,
      isEmbeddedClient: enabled,
    });

    this.appLogger.logSecurity(
      `embedded client mode ${enabled ? 'enabled' : 'disabled'}`,
    );
  }
}
