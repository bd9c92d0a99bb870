import { Order } from '@/order/domain/entities/order.entity';
import { OrderStatus } from '@/order/domain/entities/order-status.vo';
import {
  DomainException,
  ErrorCode,
  ValidationException,
} from '@common/exception';

const createOrder = (
  status: OrderStatus = OrderStatus.PENDING,
  subtotal: number = 0,
  total: number = 0,
): Order =>
  new Order(
    1,
    'ORD-12345678-000001',
    1,
    status,
    subtotal,
    total,
    new Date('2024-01-01T00:00:00Z'),
    new Date('2024-01-01T00:00:00Z'),
  );

describe('Order', () => {
  describe('생성자', () => {
    it('given: 소계보다 작은 총액 / when: 주문을 생성함 / then: INVALID_AMOUNT ValidationException', () => {
      // when & then
      expect(() => createOrder(OrderStatus.PENDING, 1000, 500)).toThrow(
        new ValidationException(ErrorCode.INVALID_AMOUNT),
      );
    });

    it('given: 음수 금액 / when: 주문을 생성함 / then: INVALID_AMOUNT ValidationException', () => {
      expect(() => createOrder(OrderStatus.PENDING, -1, 0)).toThrow(
        ValidationException,
      );
    });

    it('given: 형식이 맞지 않는 주문번호 / when: 주문을 생성함 / then: INVALID_ORDER_NUMBER ValidationException', () => {
      // when & then
      expect(
        () =>
          new Order(1, 'ORDER-1', 1, OrderStatus.PENDING, 0, 0, new Date()),
      ).toThrow(new ValidationException(ErrorCode.INVALID_ORDER_NUMBER));
    });
  });

  describe('generateOrderNumber', () => {
    it('given: epoch ms / when: 주문번호를 생성함 / then: 하위 8자리 시각과 6자리 난수로 구성됨', () => {
      // when
      const orderNumber = Order.generateOrderNumber(1_700_000_123_456);

      // then
      expect(orderNumber).toMatch(/^ORD-00123456-\d{6}$/);
    });
  });

  describe('markPaid', () => {
    it('given: PENDING 주문 / when: markPaid / then: PAID로 변경됨', () => {
      // given
      const order = createOrder();

      // when
      order.markPaid();

      // then
      expect(order.status).toBe(OrderStatus.PAID);
    });

    it('given: FAILED 주문 / when: markPaid / then: 재결제 성공으로 PAID로 변경됨', () => {
      // given
      const order = createOrder(OrderStatus.FAILED);

      // when
      order.markPaid();

      // then
      expect(order.status).toBe(OrderStatus.PAID);
    });

    it('given: 이미 PAID인 주문 / when: markPaid / then: ALREADY_PAID DomainException', () => {
      // given
      const order = createOrder(OrderStatus.PAID);

      // when & then
      expect(() => order.markPaid()).toThrow(
        new DomainException(ErrorCode.ALREADY_PAID),
      );
    });

    it('given: CANCELLED 주문 / when: markPaid / then: INVALID_ORDER_STATUS DomainException', () => {
      // given
      const order = createOrder(OrderStatus.CANCELLED);

      // when & then
      expect(() => order.markPaid()).toThrow(
        new DomainException(ErrorCode.INVALID_ORDER_STATUS),
      );
    });
  });

  describe('markPaymentFailed / cancel / ship', () => {
    it('given: PENDING 주문 / when: markPaymentFailed / then: FAILED로 변경됨', () => {
      const order = createOrder();
      order.markPaymentFailed();
      expect(order.status).toBe(OrderStatus.FAILED);
    });

    it('given: FAILED 주문 / when: cancel / then: CANCELLED로 변경됨', () => {
      const order = createOrder(OrderStatus.FAILED);
      order.cancel();
      expect(order.status).toBe(OrderStatus.CANCELLED);
    });

    it('given: PAID 주문 / when: cancel / then: INVALID_ORDER_STATUS DomainException', () => {
      const order = createOrder(OrderStatus.PAID);
      expect(() => order.cancel()).toThrow(
        new DomainException(ErrorCode.INVALID_ORDER_STATUS),
      );
    });

    it('given: PAID 주문 / when: ship / then: SHIPPED로 변경됨', () => {
      const order = createOrder(OrderStatus.PAID);
      order.ship();
      expect(order.status).toBe(OrderStatus.SHIPPED);
    });

    it('given: PENDING 주문 / when: ship / then: INVALID_ORDER_STATUS DomainException', () => {
      const order = createOrder();
      expect(() => order.ship()).toThrow(
        new DomainException(ErrorCode.INVALID_ORDER_STATUS),
      );
    });

    it('given: 상태 변경 / when: 전이에 성공함 / then: updatedAt이 갱신됨', () => {
      // given
      const order = createOrder();
      const before = order.updatedAt;

      // when
      order.cancel();

      // then
      expect(order.updatedAt.getTime()).toBeGreaterThan(before.getTime());
    });
  });

  describe('canPay', () => {
    it.each([
      [OrderStatus.PENDING, true],
      [OrderStatus.FAILED, true],
      [OrderStatus.PAID, false],
      [OrderStatus.CANCELLED, false],
      [OrderStatus.SHIPPED, false],
    ])('given: %s 주문 / when: canPay / then: %s', (status, expected) => {
      expect(createOrder(status).canPay()).toBe(expected);
    });
  });

  describe('validateOwnedBy', () => {
    it('given: 다른 사용자 / when: validateOwnedBy / then: UNAUTHORIZED_ORDER_ACCESS DomainException', () => {
      // given
      const order = createOrder();

      // when & then
      expect(() => order.validateOwnedBy(2)).toThrow(
        new DomainException(ErrorCode.UNAUTHORIZED_ORDER_ACCESS),
      );
      expect(() => order.validateOwnedBy(1)).not.toThrow();
    });
  });
});
