import { IdempotencyRecord } from '../domain/entities/idempotency-record.entity';
import {
  IIdempotencyLedger,
  RegisterResult,
} from '../domain/interfaces/idempotency-ledger.interface';

/**
 * Idempotency Ledger Implementation (In-Memory)
 * - 확인과 저장이 같은 tick 안에서 일어나므로 단일 프로세스 내에서 원자적
 * - 만료된 레코드는 조회 시점에 정리
 */
export class IdempotencyMemoryLedger implements IIdempotencyLedger {
  private readonly records: Map<string, IdempotencyRecord> = new Map();

  constructor(private readonly clock: () => number = () => Date.now()) {}

  // ANCHOR lookup
  async lookup(idempotencyKey: string): Promise<IdempotencyRecord | null> {
    return this.liveRecord(idempotencyKey);
  }

  // ANCHOR register
  async register(
    idempotencyKey: string,
    resourceType: string,
    resourceId: string,
    ttlMs: number,
  ): Promise<RegisterResult> {
    const existing = this.liveRecord(idempotencyKey);
    if (existing) {
      return { outcome: 'conflict', record: existing };
    }

    const record = new IdempotencyRecord(
      idempotencyKey,
      resourceType,
      resourceId,
      this.clock() + ttlMs,
    );
    this.records.set(idempotencyKey, record);
    return { outcome: 'registered', record };
  }

  // ANCHOR release
  async release(idempotencyKey: string, resourceId: string): Promise<boolean> {
    const existing = this.records.get(idempotencyKey);
    if (!existing || existing.resourceId !== resourceId) {
      return false;
    }
    this.records.delete(idempotencyKey);
    return true;
  }

  size(): number {
    return this.records.size;
  }

  private liveRecord(idempotencyKey: string): IdempotencyRecord | null {
    const record = this.records.get(idempotencyKey);
    if (!record) {
      return null;
    }
    if (record.isExpired(this.clock())) {
      this.records.delete(idempotencyKey);
      return null;
    }
    return record;
  }
}
