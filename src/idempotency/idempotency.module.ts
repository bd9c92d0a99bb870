import { Module } from '@nestjs/common';
import { AppConfig } from '@common/config/app.config';
import { IIdempotencyLedger } from './domain/interfaces/idempotency-ledger.interface';
import { IdempotencyRedisLedger } from './infrastructure/idempotency.redis.ledger';
import { IdempotencyMemoryLedger } from './infrastructure/idempotency.memory.ledger';

/**
 * Idempotency Module
 * IDEMPOTENCY_STORE 설정에 따라 원장 구현체를 선택합니다.
 * - redis: 여러 인스턴스가 공유하는 원장
 * - memory: 단일 프로세스 원장
 */
@Module({
  providers: [
    IdempotencyRedisLedger,
    {
      provide: IIdempotencyLedger,
      useFactory: (
        config: AppConfig,
        redisLedger: IdempotencyRedisLedger,
      ): IIdempotencyLedger =>
        config.idempotencyStore === 'redis'
          ? redisLedger
          : new IdempotencyMemoryLedger(),
      inject: [AppConfig, IdempotencyRedisLedger],
    },
  ],
  exports: [IIdempotencyLedger],
})
export class IdempotencyModule {}
