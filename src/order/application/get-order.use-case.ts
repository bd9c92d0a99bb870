import { Injectable } from '@nestjs/common';
import { OrderDomainService } from '@/order/domain/services/order.service';
import { Order } from '@/order/domain/entities/order.entity';

@Injectable()
export class GetOrderUseCase {
  constructor(private readonly orderService: OrderDomainService) {}

  /**
   * ANCHOR 주문 단건 조회
   */
  async byId(userId: number, orderId: number): Promise<Order> {
    const order = await this.orderService.getOrder(orderId);
    order.validateOwnedBy(userId);
    return order;
  }

  /**
   * ANCHOR 주문번호로 조회
   */
  async byOrderNumber(userId: number, orderNumber: string): Promise<Order> {
    const order = await this.orderService.getOrderByNumber(orderNumber);
    order.validateOwnedBy(userId);
    return order;
  }

  /**
   * ANCHOR 사용자 주문 목록 (최신순)
   */
  async list(userId: number): Promise<Order[]> {
    return this.orderService.getOrders(userId);
  }
}
