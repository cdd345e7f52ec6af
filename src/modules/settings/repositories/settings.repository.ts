import { Settings } from '../interfaces/settings.interface';

export const SETTINGS_REPOSITORY = 'SETTINGS_REPOSITORY';

export interface SettingsRepository {
  read(): Promise<Settings>;
  update(settings: Settings): Promise<void>;
}
