import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { ConfigService } from '@nestjs/config';
import { Logger } from 'nestjs-pino';
import { ValidationPipe } from '@nestjs/common';
import { resolve } from 'path';
import { AppModule } from './app.module';

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bufferLogs: true,
  });
  app.useLogger(app.get(Logger));
  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
  app.enableShutdownHooks();

  const configService = app.get(ConfigService);
  if (configService.get<string>('STORAGE_BACKEND') === 'local') {
    app.useStaticAssets(resolve(configService.get<string>('MEDIA_ROOT', 'media')), {
      prefix: configService.get<string>('MEDIA_URL', '/media'),
    });
  }

  await app.listen(configService.get<number>('PORT', 3000));
}

void bootstrap();
