import { Injectable, Logger } from '@nestjs/common';
import { AppConfig } from '@common/config/app.config';
import { ILockManager } from '@common/lock-manager/lock-manager.interface';
import { OrderDomainService } from '@/order/domain/services/order.service';
import { Order } from '@/order/domain/entities/order.entity';
import { OrderEventType } from '@/order/domain/entities/order.types';
import { OrderKafkaProducer } from '@/order/infrastructure/order.kafka.producer';

@Injectable()
export class CancelOrderUseCase {
  private readonly logger = new Logger(CancelOrderUseCase.name);

  constructor(
    private readonly orderService: OrderDomainService,
    private readonly orderKafkaProducer: OrderKafkaProducer,
    private readonly lockManager: ILockManager,
    private readonly config: AppConfig,
  ) {}

  /**
   * ANCHOR 주문 취소 (PENDING / FAILED 만 가능)
   */
  async execute(userId: number, orderId: number): Promise<Order> {
    const order = await this.lockManager.withLock(
      `order:${orderId}`,
      async () => {
        const target = await this.orderService.getOrder(orderId);
        target.validateOwnedBy(userId);

        target.cancel();
        return await this.orderService.updateOrder(target);
      },
      { waitTimeout: this.config.idempotencyLockWaitMs },
    );

    this.logger.log(`[주문취소] 완료 - orderId: ${orderId}`);

    try {
      await this.orderKafkaProducer.publishOrderEvent(
        OrderEventType.ORDER_CANCELLED,
        order,
        null,
      );
    } catch (error) {
      this.logger.error(
        `[주문취소] ORDER_CANCELLED 발행 실패 - orderId: ${orderId}`,
        error,
      );
    }
    return order;
  }
}
