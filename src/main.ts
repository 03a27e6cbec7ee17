import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { errorStack } from './common/errors';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.enableShutdownHooks();

  const port = app.get(ConfigService).get<number>('PORT', 3000);
  await app.listen(port);

  new Logger('Bootstrap').log(`Assistant is running on port ${port}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('Failed to start', errorStack(error));
  process.exit(1);
});
