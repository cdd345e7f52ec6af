import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtModule, JwtService } from '@nestjs/jwt';
import {
  SETTINGS_REPOSITORY,
  SettingsRepository,
} from '../settings/repositories/settings.repository';
import {
  USER_REPOSITORY,
  UserRepository,
} from '../users/repositories/user.repository';
import { TokenService } from './token.service';

@Module({
  // Secrets are supplied per call from the TokenService secret table.
  imports: [JwtModule.register({})],
  providers: [
    {
      provide: TokenService,
      inject: [ConfigService, JwtService, SETTINGS_REPOSITORY, USER_REPOSITORY],
      useFactory: async (
        configService: ConfigService,
        jwtService: JwtService,
        settingsRepository: SettingsRepository,
        userRepository: UserRepository,
      ): Promise<TokenService> => {
        const settings = await settingsRepository.read();
        const sessionDuration =
          settings.userSessionTimeout ??
          configService.get<string>('auth.sessionDuration', '8h');

        return TokenService.create({
          sessionDuration,
          jwtService,
          settingsRepository,
          userRepository,
        });
      },
    },
  ],
  exports: [TokenService],
})
export class AuthModule {}
