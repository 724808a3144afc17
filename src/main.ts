import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { LogLevel, Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { setupApp } from './app.setup';
import configuration from './config/configuration';

async function bootstrap() {
  const config = configuration();
  const logger: LogLevel[] = config.debug
    ? ['error', 'warn', 'log', 'debug', 'verbose']
    : ['error', 'warn', 'log'];

  const app = await NestFactory.create(AppModule, { logger });
  setupApp(app, config);
  await app.listen(config.port);
  new Logger('Bootstrap').log(`Listening on port ${config.port}`);
}
bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('Failed to start', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
