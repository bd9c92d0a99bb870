import { ErrorCode, ValidationException } from '@common/exception';

export type OrderStatusValue =
  | 'PENDING'
  | 'PAID'
  | 'FAILED'
  | 'CANCELLED'
  | 'SHIPPED';

/**
 * OrderStatus Value Object
 * 주문 상태와 허용되는 상태 전이를 나타내는 값 객체
 */
export class OrderStatus {
  private constructor(public readonly value: OrderStatusValue) {}

  static readonly PENDING = new OrderStatus('PENDING');
  static readonly PAID = new OrderStatus('PAID');
  static readonly FAILED = new OrderStatus('FAILED');
  static readonly CANCELLED = new OrderStatus('CANCELLED');
  static readonly SHIPPED = new OrderStatus('SHIPPED');

  // from -> 허용되는 to 목록 (CANCELLED, SHIPPED는 종료 상태)
  private static readonly TRANSITIONS: Record<
    OrderStatusValue,
    readonly OrderStatusValue[]
  > = {
    PENDING: ['PAID', 'FAILED', 'CANCELLED'],
    FAILED: ['PAID', 'CANCELLED'],
    PAID: ['SHIPPED'],
    CANCELLED: [],
    SHIPPED: [],
  };

  static from(value: string): OrderStatus {
    const normalized = value.toUpperCase();
    switch (normalized) {
      case 'PENDING':
        return OrderStatus.PENDING;
      case 'PAID':
        return OrderStatus.PAID;
      case 'FAILED':
        return OrderStatus.FAILED;
      case 'CANCELLED':
        return OrderStatus.CANCELLED;
      case 'SHIPPED':
        return OrderStatus.SHIPPED;
      default:
        throw new ValidationException(ErrorCode.INVALID_ORDER_STATUS);
    }
  }

  get(): OrderStatusValue {
    return this.value;
  }

  canTransitionTo(next: OrderStatus): boolean {
    return OrderStatus.TRANSITIONS[this.value].includes(next.value);
  }

  isPending(): boolean {
    return this === OrderStatus.PENDING;
  }

  isPaid(): boolean {
    return this === OrderStatus.PAID;
  }

  isFailed(): boolean {
    return this === OrderStatus.FAILED;
  }

  isCancelled(): boolean {
    return this === OrderStatus.CANCELLED;
  }

  isTerminal(): boolean {
    return OrderStatus.TRANSITIONS[this.value].length === 0;
  }

  equals(other: OrderStatus): boolean {
    return this === other;
  }
}
