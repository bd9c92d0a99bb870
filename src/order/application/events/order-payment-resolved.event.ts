import { PaymentResult } from '@/payment/domain/entities/payment-result';

/**
 * 주문 결제 결과 확정 이벤트
 *
 * 이벤트명: order.payment.resolved
 * 발행: PayOrderUseCase (게이트웨이 결과 수신 직후)
 * 구독: OnOrderPaymentResolvedListener (주문 상태 반영 + Kafka 발행)
 */
export class OrderPaymentResolvedEvent {
  static readonly EVENT_NAME = 'order.payment.resolved';

  constructor(
    public readonly orderId: number,
    public readonly userId: number,
    public readonly result: PaymentResult,
  ) {}
}
