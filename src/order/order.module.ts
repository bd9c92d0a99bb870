import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { OrderDomainService } from '@/order/domain/services/order.service';
import { IOrderRepository } from '@/order/domain/interfaces/order.repository.interface';
import { OrderRepository } from '@/order/infrastructure/order.repository';
import { OrderOrmEntity } from '@/order/infrastructure/entities/order.orm-entity';
import { IdempotencyModule } from '@/idempotency/idempotency.module';
import { PaymentModule } from '@/payment/payment.module';

// Use Cases
import { CreateOrderUseCase } from '@/order/application/create-order.use-case';
import { PayOrderUseCase } from '@/order/application/pay-order.use-case';
import { CancelOrderUseCase } from '@/order/application/cancel-order.use-case';
import { GetOrderUseCase } from '@/order/application/get-order.use-case';

// Event Listeners
import { OnOrderPaymentResolvedListener } from '@/order/application/listeners/on-order-payment-resolved.listener';

// Infrastructure Services
import { OrderKafkaProducer } from '@/order/infrastructure/order.kafka.producer';

/**
 * Order Module
 * 주문 생성(멱등성), 조회, 취소, 결제 요청
 */
@Module({
  imports: [
    TypeOrmModule.forFeature([OrderOrmEntity]),
    IdempotencyModule,
    PaymentModule,
  ],
  providers: [
    // Order Repository
    {
      provide: IOrderRepository,
      useClass: OrderRepository,
    },

    // Domain Service
    OrderDomainService,

    // Use Cases
    CreateOrderUseCase,
    PayOrderUseCase,
    CancelOrderUseCase,
    GetOrderUseCase,

    // Event Listeners
    OnOrderPaymentResolvedListener,

    // Infrastructure Services
    OrderKafkaProducer,
  ],
  exports: [
    CreateOrderUseCase,
    PayOrderUseCase,
    CancelOrderUseCase,
    GetOrderUseCase,
  ],
})
export class OrderModule {}
