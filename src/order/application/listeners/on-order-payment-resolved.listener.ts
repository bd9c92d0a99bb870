import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { OrderPaymentResolvedEvent } from '@/order/application/events/order-payment-resolved.event';
import { OrderDomainService } from '@/order/domain/services/order.service';
import { OrderEventType } from '@/order/domain/entities/order.types';
import { OrderKafkaProducer } from '@/order/infrastructure/order.kafka.producer';

/**
 * order.payment.resolved
 * - 성공: PAID 처리 + ORDER_PAID 발행
 * - 실패(취소 제외): FAILED 처리 + ORDER_PAYMENT_FAILED 발행
 * - 취소: 상태 변경 없음
 */
@Injectable()
export class OnOrderPaymentResolvedListener {
  private readonly logger = new Logger(
    'order:' + OnOrderPaymentResolvedListener.name,
  );

  constructor(
    private readonly orderService: OrderDomainService,
    private readonly orderKafkaProducer: OrderKafkaProducer,
  ) {}

  @OnEvent(OrderPaymentResolvedEvent.EVENT_NAME)
  async handle(event: OrderPaymentResolvedEvent): Promise<void> {
    const { orderId, result } = event;

    if (!result.success && result.reason === 'CANCELLED') {
      this.logger.log(
        `[order.payment.resolved] 취소된 결제 - 상태 유지 - orderId: ${orderId}`,
      );
      return;
    }

    try {
      const order = await this.orderService.getOrder(orderId);

      if (result.success) {
        // 이미 완료된 경우 스킵
        if (order.status.isPaid()) {
          return;
        }
        order.markPaid();
        await this.orderService.updateOrder(order);
        await this.orderKafkaProducer.publishOrderEvent(
          OrderEventType.ORDER_PAID,
          order,
          null,
          { transactionId: result.transactionId },
        );
        return;
      }

      if (order.status.isFailed()) {
        return;
      }
      order.markPaymentFailed();
      await this.orderService.updateOrder(order);
      await this.orderKafkaProducer.publishOrderEvent(
        OrderEventType.ORDER_PAYMENT_FAILED,
        order,
        null,
        { reason: result.reason, message: result.message },
      );
    } catch (error) {
      this.logger.error(
        `[order.payment.resolved] 실패 - orderId: ${orderId}`,
        error,
      );
    }
  }
}
