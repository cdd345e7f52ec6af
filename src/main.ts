import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { AppLoggerService } from './common/services/app-logger.service';
import { TokenService } from './modules/auth/token.service';

async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });
  app.useLogger(app.get(AppLoggerService));

  const logger = new Logger('Bootstrap');
  const tokenService = app.get(TokenService);
  logger.log(
    `Token service ready; session duration ${tokenService.getSessionDuration()}ms`,
  );

  // Startup check only; hosts import AppModule into their own process.
  await app.close();
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    `Startup aborted: ${error instanceof Error ? error.message : String(error)}`,
  );
  process.exit(1);
});
