import { Injectable, Logger } from '@nestjs/common';
import type Redis from 'ioredis';
import { RedisService } from '@common/redis/redis.service';
import { ErrorCode, RepositoryException } from '@common/exception';
import { IdempotencyRecord } from '../domain/entities/idempotency-record.entity';
import {
  IIdempotencyLedger,
  RegisterResult,
} from '../domain/interfaces/idempotency-ledger.interface';

/**
 * Idempotency Ledger Implementation (Redis)
 * - 키: idempotency:{key}, 값: 레코드 JSON, 만료: PX
 * - 등록은 SET NX 한 번으로 원자적
 */
@Injectable()
export class IdempotencyRedisLedger implements IIdempotencyLedger {
  private readonly logger = new Logger(IdempotencyRedisLedger.name);
  private readonly KEY_PREFIX = 'idempotency:';
  // SET NX 실패 후 GET 사이에 선점 레코드가 만료되는 경우 재시도 횟수
  private readonly MAX_REGISTER_ATTEMPTS = 3;

  private readonly releaseScript = `
    local value = redis.call('get', KEYS[1])
    if not value then
      return 0
    end
    local record = cjson.decode(value)
    if record['resourceId'] == ARGV[1] then
      redis.call('del', KEYS[1])
      return 1
    end
    return 0
  `;

  constructor(private readonly redisService: RedisService) {}

  // ANCHOR lookup
  async lookup(idempotencyKey: string): Promise<IdempotencyRecord | null> {
    const raw = await this.call('lookup', (client) =>
      client.get(this.keyOf(idempotencyKey)),
    );
    if (raw === null) {
      return null;
    }

    const record = IdempotencyRecord.parse(raw);
    if (!record) {
      this.logger.error(
        `[멱등성] 손상된 레코드 - key: ${idempotencyKey}, value: ${raw}`,
      );
      throw new RepositoryException(ErrorCode.IDEMPOTENCY_LEDGER_FAILURE);
    }
    return record.isExpired() ? null : record;
  }

  // ANCHOR register
  async register(
    idempotencyKey: string,
    resourceType: string,
    resourceId: string,
    ttlMs: number,
  ): Promise<RegisterResult> {
    for (let attempt = 1; attempt <= this.MAX_REGISTER_ATTEMPTS; attempt++) {
      const record = new IdempotencyRecord(
        idempotencyKey,
        resourceType,
        resourceId,
        Date.now() + ttlMs,
      );

      const result = await this.call('register', (client) =>
        client.set(
          this.keyOf(idempotencyKey),
          record.serialize(),
          'PX',
          ttlMs,
          'NX',
        ),
      );
      if (result === 'OK') {
        return { outcome: 'registered', record };
      }

      const winner = await this.lookup(idempotencyKey);
      if (winner) {
        return { outcome: 'conflict', record: winner };
      }

      this.logger.debug(
        `[멱등성] 선점 레코드가 만료되어 재시도 - key: ${idempotencyKey}, attempt: ${attempt}`,
      );
    }

    throw new RepositoryException(ErrorCode.IDEMPOTENCY_LEDGER_FAILURE);
  }

  // ANCHOR release
  async release(idempotencyKey: string, resourceId: string): Promise<boolean> {
    const result = await this.call('release', (client) =>
      client.eval(this.releaseScript, 1, this.keyOf(idempotencyKey), resourceId),
    );
    return result === 1;
  }

  private keyOf(idempotencyKey: string): string {
    return `${this.KEY_PREFIX}${idempotencyKey}`;
  }

  private async call<T>(
    operation: string,
    command: (client: Redis) => Promise<T>,
  ): Promise<T> {
    try {
      return await command(this.redisService.getClient());
    } catch (error) {
      if (error instanceof RepositoryException) {
        throw error;
      }
      this.logger.error(`[멱등성] Redis ${operation} 실패`, error);
      throw new RepositoryException(
        ErrorCode.IDEMPOTENCY_LEDGER_FAILURE,
        error instanceof Error ? error : undefined,
      );
    }
  }
}
