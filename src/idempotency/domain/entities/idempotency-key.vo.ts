import { ErrorCode, ValidationException } from '@common/exception';

const MAX_KEY_LENGTH = 255;

/**
 * IdempotencyKey Value Object
 * 클라이언트가 정한 불투명 문자열. 값은 바꾸지 않고 길이(1~255자)만 검사한다.
 */
export class IdempotencyKey {
  private constructor(private readonly value: string) {}

  static of(raw: string): IdempotencyKey {
    const length = Array.from(raw).length;
    if (length === 0 || length > MAX_KEY_LENGTH || raw.trim().length === 0) {
      throw new ValidationException(ErrorCode.INVALID_IDEMPOTENCY_KEY);
    }
    return new IdempotencyKey(raw);
  }

  getValue(): string {
    return this.value;
  }

  equals(other: IdempotencyKey): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }
}
