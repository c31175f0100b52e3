import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module.js';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.enableShutdownHooks();
  const port = parseInt(process.env.PORT ?? '3000', 10);
  await app.listen(port);
  new Logger('Bootstrap').log(`Battle AI server listening on :${port}`);
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error('Failed to start', err instanceof Error ? err.stack : String(err));
  process.exit(1);
});
