import { randomInt } from 'crypto';
import {
  DomainException,
  ErrorCode,
  ValidationException,
} from '@common/exception';
import { OrderStatus } from './order-status.vo';

const ORDER_NUMBER_PATTERN = /^ORD-\d{8}-\d{6}$/;

/**
 * Order Entity
 * 주문 정보
 */
export class Order {
  constructor(
    public readonly id: number,
    public readonly orderNumber: string,
    public readonly userId: number,
    public status: OrderStatus,
    public subtotal: number,
    public total: number,
    public readonly createdAt: Date,
    public updatedAt: Date = new Date(),
  ) {
    this.validateOrderNumber();
    this.validateAmounts();
  }

  /**
   * ANCHOR 주문번호 생성
   * ORD-<epoch ms 하위 8자리>-<6자리 난수>
   */
  static generateOrderNumber(now: number = Date.now()): string {
    const timePart = String(now % 100_000_000).padStart(8, '0');
    const randomPart = String(randomInt(0, 1_000_000)).padStart(6, '0');
    return `ORD-${timePart}-${randomPart}`;
  }

  private validateOrderNumber(): void {
    if (!ORDER_NUMBER_PATTERN.test(this.orderNumber)) {
      throw new ValidationException(ErrorCode.INVALID_ORDER_NUMBER);
    }
  }

  private validateAmounts(): void {
    if (this.subtotal < 0 || this.total < 0) {
      throw new ValidationException(ErrorCode.INVALID_AMOUNT);
    }
    if (this.total < this.subtotal) {
      throw new ValidationException(ErrorCode.INVALID_AMOUNT);
    }
  }

  /**
   * ANCHOR 사용자 소유 검증
   */
  validateOwnedBy(userId: number): void {
    if (!this.isOwnedBy(userId)) {
      throw new DomainException(ErrorCode.UNAUTHORIZED_ORDER_ACCESS);
    }
  }

  isOwnedBy(userId: number): boolean {
    return this.userId === userId;
  }

  /**
   * ANCHOR 결제 가능 여부 확인 (PENDING 또는 결제 실패 후 재시도)
   */
  canPay(): boolean {
    return this.status.canTransitionTo(OrderStatus.PAID);
  }

  /**
   * ANCHOR 결제 완료 처리
   */
  markPaid(): void {
    if (this.status.isPaid()) {
      throw new DomainException(ErrorCode.ALREADY_PAID);
    }
    this.transitionTo(OrderStatus.PAID);
  }

  /**
   * ANCHOR 결제 실패 처리
   */
  markPaymentFailed(): void {
    this.transitionTo(OrderStatus.FAILED);
  }

  /**
   * ANCHOR 주문 취소
   */
  cancel(): void {
    this.transitionTo(OrderStatus.CANCELLED);
  }

  /**
   * ANCHOR 배송 시작
   */
  ship(): void {
    this.transitionTo(OrderStatus.SHIPPED);
  }

  private transitionTo(next: OrderStatus): void {
    if (!this.status.canTransitionTo(next)) {
      throw new DomainException(ErrorCode.INVALID_ORDER_STATUS);
    }
    this.status = next;
    this.updatedAt = new Date();
  }
}
