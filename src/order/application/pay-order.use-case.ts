import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { AppConfig } from '@common/config/app.config';
import { ILockManager } from '@common/lock-manager/lock-manager.interface';
import { DomainException, ErrorCode } from '@common/exception';
import { OrderDomainService } from '@/order/domain/services/order.service';
import { PaymentOrchestrator } from '@/payment/application/payment.orchestrator';
import { PaymentResult } from '@/payment/domain/entities/payment-result';
import { OrderPaymentResolvedEvent } from './events/order-payment-resolved.event';

export interface PayOrderCommand {
  orderId: number;
  userId: number;
  signal?: AbortSignal;
}

@Injectable()
export class PayOrderUseCase {
  private readonly logger = new Logger(PayOrderUseCase.name);

  constructor(
    private readonly orderService: OrderDomainService,
    private readonly paymentOrchestrator: PaymentOrchestrator,
    private readonly lockManager: ILockManager,
    private readonly eventEmitter: EventEmitter2,
    private readonly config: AppConfig,
  ) {}

  /**
   * ANCHOR 결제 요청
   *
   * - order:{orderId} 락으로 같은 주문의 중복 결제 방지
   * - 결제 결과 반영(상태 변경, Kafka 발행)은 order.payment.resolved 리스너가 담당
   */
  async execute(cmd: PayOrderCommand): Promise<PaymentResult> {
    return this.lockManager.withLock(
      `order:${cmd.orderId}`,
      async () => {
        const order = await this.orderService.getOrder(cmd.orderId);
        order.validateOwnedBy(cmd.userId);

        if (!order.canPay()) {
          throw new DomainException(
            order.status.isPaid()
              ? ErrorCode.ALREADY_PAID
              : ErrorCode.INVALID_ORDER_STATUS,
          );
        }

        const result = await this.paymentOrchestrator.processPayment(
          order.id,
          { signal: cmd.signal },
        );

        this.logger.log(
          `[결제] 결과 확정 - orderId: ${order.id}, success: ${result.success}`,
        );

        await this.eventEmitter.emitAsync(
          OrderPaymentResolvedEvent.EVENT_NAME,
          new OrderPaymentResolvedEvent(order.id, cmd.userId, result),
        );

        return result;
      },
      { waitTimeout: this.config.idempotencyLockWaitMs },
    );
  }
}
