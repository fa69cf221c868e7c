import 'reflect-metadata';
import * as dotenv from 'dotenv';
import * as path from 'node:path';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { APP_CONFIG, AppConfig } from './config/app.config';

dotenv.config({ path: path.resolve(process.cwd(), '.env') });

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const config = app.get<AppConfig>(APP_CONFIG);
  configureApp(app, config);
  app.enableShutdownHooks();

  await app.listen(config.port);
  new Logger('Bootstrap').log(`Storefront listening on port ${config.port}`);
}

bootstrap().catch((err) => {
  console.error(err);
  process.exit(1);
});
