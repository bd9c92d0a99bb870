import { Injectable, Logger } from '@nestjs/common';
import { EventAck, IEventBus } from '@common/kafka/event-bus.interface';
import {
  TOPIC_IDEMPOTENCY_KEYS,
  TOPIC_ORDER_EVENTS,
} from '@common/kafka/kafka.topics';
import { Order } from '@/order/domain/entities/order.entity';
import { OrderEventType } from '@/order/domain/entities/order.types';
import { IdempotencyRecord } from '@/idempotency/domain/entities/idempotency-record.entity';

export interface OrderEventMessage {
  eventType: OrderEventType;
  orderId: number;
  orderNumber: string;
  userId: number;
  status: string;
  total: number;
  idempotencyKey: string | null;
  timestamp: string;
  metadata?: Record<string, string>;
}

export interface IdempotencyEventMessage {
  idempotencyKey: string;
  resourceType: string;
  resourceId: string;
  ttlSeconds: number;
  expiresAt: string;
  timestamp: string;
}

/**
 * Order Kafka Producer (Infrastructure Service)
 * - 주문 상태 변경 이벤트: order-events (key = orderId)
 * - 멱등성 키 등록 이벤트: idempotency-keys (key = 멱등성 키)
 */
@Injectable()
export class OrderKafkaProducer {
  private readonly logger = new Logger(OrderKafkaProducer.name);

  constructor(private readonly eventBus: IEventBus) {}

  async publishOrderEvent(
    eventType: OrderEventType,
    order: Order,
    idempotencyKey: string | null,
    metadata?: Record<string, string>,
  ): Promise<EventAck> {
    const message: OrderEventMessage = {
      eventType,
      orderId: order.id,
      orderNumber: order.orderNumber,
      userId: order.userId,
      status: order.status.value,
      total: order.total,
      idempotencyKey,
      timestamp: new Date().toISOString(),
      ...(metadata ? { metadata } : {}),
    };

    const ack = await this.eventBus.publish(
      TOPIC_ORDER_EVENTS,
      String(order.id),
      message,
      { 'event-type': eventType },
    );

    this.logger.log(
      `[Kafka] 주문 이벤트 발행 완료 - type: ${eventType}, orderId: ${order.id}, partition: ${ack.partition}`,
    );
    return ack;
  }

  async publishIdempotencyRegistered(
    record: IdempotencyRecord,
  ): Promise<EventAck> {
    const now = Date.now();
    const message: IdempotencyEventMessage = {
      idempotencyKey: record.idempotencyKey,
      resourceType: record.resourceType,
      resourceId: record.resourceId,
      ttlSeconds: record.remainingSeconds(now),
      expiresAt: new Date(record.expiresAt).toISOString(),
      timestamp: new Date(now).toISOString(),
    };

    const ack = await this.eventBus.publish(
      TOPIC_IDEMPOTENCY_KEYS,
      record.idempotencyKey,
      message,
      { 'event-type': 'IDEMPOTENCY_KEY_REGISTERED' },
    );

    this.logger.log(
      `[Kafka] 멱등성 키 이벤트 발행 완료 - key: ${record.idempotencyKey}, resourceId: ${record.resourceId}`,
    );
    return ack;
  }
}
