import { Global, Module } from '@nestjs/common';
import { InMemorySettingsRepository } from '../modules/settings/repositories/in-memory-settings.repository';
import { RedisSettingsRepository } from '../modules/settings/repositories/redis-settings.repository';
import {
  SETTINGS_REPOSITORY,
  SettingsRepository,
} from '../modules/settings/repositories/settings.repository';
import { InMemoryUserRepository } from '../modules/users/repositories/in-memory-user.repository';
import { RedisUserRepository } from '../modules/users/repositories/redis-user.repository';
import {
  USER_REPOSITORY,
  UserRepository,
} from '../modules/users/repositories/user.repository';
import { AppLoggerService } from './services/app-logger.service';
import { RedisService } from './services/redis.service';

@Global()
@Module({
  providers: [
    AppLoggerService,
    RedisService,
    {
      provide: SETTINGS_REPOSITORY,
      inject: [RedisService],
      useFactory: (redis: RedisService): SettingsRepository =>
        redis.isEnabled()
          ? new RedisSettingsRepository(redis.getClient(), redis.keyPrefix)
          : new InMemorySettingsRepository(),
    },
    {
      provide: USER_REPOSITORY,
      inject: [RedisService],
      useFactory: (redis: RedisService): UserRepository =>
        redis.isEnabled()
          ? new RedisUserRepository(redis.getClient(), redis.keyPrefix)
          : new InMemoryUserRepository(),
    },
  ],
  exports: [AppLoggerService, RedisService, SETTINGS_REPOSITORY, USER_REPOSITORY],
})
export class CommonModule {}
