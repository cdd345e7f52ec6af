import { Settings, defaultSettings } from '../interfaces/settings.interface';
import { SettingsRepository } from './settings.repository';

const cloneSettings = (settings: Settings): Settings => ({
  ...settings,
  kubeSecretKey: settings.kubeSecretKey
    ? Buffer.from(settings.kubeSecretKey)
    : null,
});

export class InMemorySettingsRepository implements SettingsRepository {
  private settings: Settings;

  constructor(initial: Settings = defaultSettings()) {
    this.settings = cloneSettings(initial);
  }

  async read(): Promise<Settings> {
    return cloneSettings(this.settings);
  }

  async update(settings: Settings): Promise<void> {
    this.settings = cloneSettings(settings);
  }
}
