import { IdempotencyRecord } from '../entities/idempotency-record.entity';

export type RegisterResult =
  | { outcome: 'registered'; record: IdempotencyRecord }
  /** 이미 살아있는 레코드가 있음 - record는 선점한 쪽 */
  | { outcome: 'conflict'; record: IdempotencyRecord };

/**
 * Idempotency Ledger Port
 * 멱등성 키 -> 리소스 매핑 저장소
 */
export abstract class IIdempotencyLedger {
  /** 만료된 레코드는 없는 것으로 취급 */
  abstract lookup(idempotencyKey: string): Promise<IdempotencyRecord | null>;

  /** 원자적 등록 (check-and-set) */
  abstract register(
    idempotencyKey: string,
    resourceType: string,
    resourceId: string,
    ttlMs: number,
  ): Promise<RegisterResult>;

  /**
   * resourceId가 일치할 때만 삭제 (compare-and-delete)
   * 주문 트랜잭션이 커밋되지 못한 등록을 되돌릴 때만 사용한다.
   */
  abstract release(idempotencyKey: string, resourceId: string): Promise<boolean>;
}
