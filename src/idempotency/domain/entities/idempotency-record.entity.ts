interface IdempotencyRecordPayload {
  idempotencyKey: string;
  resourceType: string;
  resourceId: string;
  expiresAt: number;
}

const isRecordPayload = (value: unknown): value is IdempotencyRecordPayload =>
  typeof value === 'object' &&
  value !== null &&
  'idempotencyKey' in value &&
  typeof value.idempotencyKey === 'string' &&
  'resourceType' in value &&
  typeof value.resourceType === 'string' &&
  'resourceId' in value &&
  typeof value.resourceId === 'string' &&
  'expiresAt' in value &&
  typeof value.expiresAt === 'number';

/**
 * IdempotencyRecord Entity
 * 멱등성 키가 어떤 리소스를 가리키는지와 만료 시각(epoch ms)
 */
export class IdempotencyRecord {
  constructor(
    public readonly idempotencyKey: string,
    public readonly resourceType: string,
    public readonly resourceId: string,
    public readonly expiresAt: number,
  ) {}

  /**
   * 직렬화된 레코드를 복원한다. 형식이 맞지 않으면 null
   */
  static parse(raw: string): IdempotencyRecord | null {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      return null;
    }

    if (!isRecordPayload(parsed)) {
      return null;
    }
    return new IdempotencyRecord(
      parsed.idempotencyKey,
      parsed.resourceType,
      parsed.resourceId,
      parsed.expiresAt,
    );
  }

  isExpired(now: number = Date.now()): boolean {
    return this.expiresAt <= now;
  }

  /** 남은 TTL (초, 올림) */
  remainingSeconds(now: number = Date.now()): number {
    return Math.max(0, Math.ceil((this.expiresAt - now) / 1000));
  }

  serialize(): string {
    const payload: IdempotencyRecordPayload = {
      idempotencyKey: this.idempotencyKey,
      resourceType: this.resourceType,
      resourceId: this.resourceId,
      expiresAt: this.expiresAt,
    };
    return JSON.stringify(payload);
  }
}
