import { Module } from '@nestjs/common';
import { AuthModule } from '../auth/auth.module';
import { SettingsService } from './settings.service';

@Module({
  imports: [AuthModule],
  providers: [SettingsService],
  exports: [SettingsService],
})
export class SettingsModule {}
