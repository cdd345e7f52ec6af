import { BadRequestException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { AppLoggerService } from '../../../common/services/app-logger.service';
import { TokenService } from '../../auth/token.service';
import { InMemorySettingsRepository } from '../repositories/in-memory-settings.repository';
import { SETTINGS_REPOSITORY } from '../repositories/settings.repository';
import { SettingsService } from '../settings.service';

describe('SettingsService', () => {
  let service: SettingsService;
  let settingsRepository: InMemorySettingsRepository;
  let setSessionDuration: jest.Mock;
  let logSecurity: jest.Mock;

  beforeEach(async () => {
    settingsRepository = new InMemorySettingsRepository();
    setSessionDuration = jest.fn();
    logSecurity = jest.fn();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        SettingsService,
        { provide: SETTINGS_REPOSITORY, useValue: settingsRepository },
        { provide: TokenService, useValue: { setSessionDuration } },
        {
          provide: AppLoggerService,
          useValue: { log: jest.fn(), logSecurity },
        },
      ],
    }).compile();

    service = module.get<SettingsService>(SettingsService);
  });

  describe('updateUserSessionTimeout', () => {
    it('should persist the timeout and apply it to the token service', async () => {
      await service.updateUserSessionTimeout('12h');

      const settings = await settingsRepository.read();
      expect(settings.userSessionTimeout).toBe('12h');
      expect(setSessionDuration).toHaveBeenCalledWith(12 * 60 * 60 * 1000);
    });

    it('should reject invalid durations without touching state', async () => {
      await expect(
        service.updateUserSessionTimeout('eventually'),
      ).rejects.toBeInstanceOf(BadRequestException);

      const settings = await settingsRepository.read();
      expect(settings.userSessionTimeout).toBeNull();
      expect(setSessionDuration).not.toHaveBeenCalled();
    });
  });

  describe('updateKubeconfigExpiry', () => {
    it('should accept "0" as never expiring', async () => {
      await service.updateKubeconfigExpiry('0');

      const settings = await settingsRepository.read();
      expect(settings.kubeconfigExpiry).toBe('0');
    });

    it('should persist a kubeconfig lifetime', async () => {
      await service.updateKubeconfigExpiry('30d');

      const settings = await settingsRepository.read();
      expect(settings.kubeconfigExpiry).toBe('30d');
    });

    it('should reject invalid durations', async () => {
      await expect(
        service.updateKubeconfigExpiry('-5m'),
      ).rejects.toBeInstanceOf(BadRequestException);
    });
  });

  describe('setEmbeddedClientMode', () => {
    it('should persist the flag and record a security event', async () => {
      await service.setEmbeddedClientMode(true);

      const settings = await settingsRepository.read();
      expect(settings.isEmbeddedClient).toBe(true);
      expect(logSecurity).toHaveBeenCalledWith('embedded client mode enabled');
    });
  });
});
