import 'reflect-metadata';
import 'dotenv/config';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';

/**
 * HTTP 계층은 외부에서 제공되므로 애플리케이션 컨텍스트만 띄운다.
 * 종료 시그널을 받으면 Kafka producer, Redis 연결을 정리한다.
 */
async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule);
  app.enableShutdownHooks();

  new Logger('Bootstrap').log('Order core application context started');
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('Failed to start application', error);
  process.exit(1);
});
