import { Order } from '@/order/domain/entities/order.entity';

/**
 * Order Repository Port
 * 주문 데이터 접근 계약
 */
export abstract class IOrderRepository {
  abstract findById(id: number): Promise<Order | null>;
  abstract findByOrderNumber(orderNumber: string): Promise<Order | null>;
  /** 최신 주문 순 */
  abstract findManyByUserId(userId: number): Promise<Order[]>;
  abstract create(order: Order): Promise<Order>;
  abstract update(order: Order): Promise<Order>;
}
