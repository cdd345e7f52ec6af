import { Redis as RedisClient } from 'ioredis';
import { redisKeys } from '../../../common/constants/app.constants';
import { Settings, defaultSettings } from '../interfaces/settings.interface';
import { SettingsRepository } from './settings.repository';

export type SettingsRedisClient = Pick<RedisClient, 'get' | 'set'>;

/**
 * Stored shape of the settings document. The secret is kept base64-encoded.
 */
interface SettingsDocument {
  kubeSecretKey: string | null;
  isEmbeddedClient: boolean;
  userSessionTimeout: string | null;
  kubeconfigExpiry: string;
}

export class RedisSettingsRepository implements SettingsRepository {
  constructor(
    private readonly redis: SettingsRedisClient,
    private readonly keyPrefix: string,
  ) {}

  async read(): Promise<Settings> {
    const raw = await this.redis.get(this.key());
    if (raw === null) {
      return defaultSettings();
    }
    return RedisSettingsRepository.fromDocument(JSON.parse(raw));
  }

  async update(settings: Settings): Promise<void> {
    const doc: SettingsDocument = {
      kubeSecretKey: settings.kubeSecretKey
        ? settings.kubeSecretKey.toString('base64')
        : null,
      isEmbeddedClient: settings.isEmbeddedClient,
      userSessionTimeout: settings.userSessionTimeout,
      kubeconfigExpiry: settings.kubeconfigExpiry,
    };
    await this.redis.set(this.key(), JSON.stringify(doc));
  }

  private key(): string {
    return `${this.keyPrefix}${redisKeys.SETTINGS}`;
  }

  private static fromDocument(doc: unknown): Settings {
    const settings = defaultSettings();
    if (doc === null || typeof doc !== 'object') {
      throw new Error('Malformed settings document');
    }
    if ('kubeSecretKey' in doc && typeof doc.kubeSecretKey === 'string') {
      settings.kubeSecretKey = Buffer.from(doc.kubeSecretKey, 'base64');
    }
    if ('isEmbeddedClient' in doc && typeof doc.isEmbeddedClient === 'boolean') {
      settings.isEmbeddedClient = doc.isEmbeddedClient;
    }
    if (
      'userSessionTimeout' in doc &&
      typeof doc.userSessionTimeout === 'string'
    ) {
      settings.userSessionTimeout = doc.userSessionTimeout;
    }
    if ('kubeconfigExpiry' in doc && typeof doc.kubeconfigExpiry === 'string') {
      settings.kubeconfigExpiry = doc.kubeconfigExpiry;
    }
    return settings;
  }
}
