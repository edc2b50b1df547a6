import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.enableShutdownHooks();
  const port = app.get(ConfigService).get<number>('port') ?? 3000;
  await app.listen(port);
  Logger.log(`HTTP listening on ${port}`, 'Bootstrap');
}
void bootstrap();
