import { Injectable } from '@nestjs/common';
import { IOrderRepository } from '@/order/domain/interfaces/order.repository.interface';
import { Order } from '../entities/order.entity';
import { OrderStatus } from '../entities/order-status.vo';
import { ErrorCode, DomainException } from '@common/exception';

/**
 * OrderDomainService
 * 주문 관련 영속성 계층과 상호작용하며 핵심 비즈니스 로직을 담당한다.
 */
@Injectable()
export class OrderDomainService {
  constructor(private readonly orderRepository: IOrderRepository) {}

  /**
   * ANCHOR 주문서 생성 (PENDING, 금액 0)
   */
  async createPendingOrder(userId: number): Promise<Order> {
    const now = new Date();
    const order = new Order(
      0,
      Order.generateOrderNumber(now.getTime()),
      userId,
      OrderStatus.PENDING,
      0,
      0,
      now,
      now,
    );
    return await this.orderRepository.create(order);
  }

  /**
   * ANCHOR 주문 업데이트
   */
  async updateOrder(order: Order): Promise<Order> {
    return await this.orderRepository.update(order);
  }

  /**
   * ANCHOR 주문 조회
   */
  async getOrder(orderId: number): Promise<Order> {
    const order = await this.orderRepository.findById(orderId);
    if (!order) {
      throw new DomainException(ErrorCode.ORDER_NOT_FOUND);
    }
    return order;
  }

  /**
   * ANCHOR 주문 조회 (없으면 null)
   */
  async findOrder(orderId: number): Promise<Order | null> {
    return await this.orderRepository.findById(orderId);
  }

  /**
   * ANCHOR 주문번호로 조회
   */
  async getOrderByNumber(orderNumber: string): Promise<Order> {
    const order = await this.orderRepository.findByOrderNumber(orderNumber);
    if (!order) {
      throw new DomainException(ErrorCode.ORDER_NOT_FOUND);
    }
    return order;
  }

  /**
   * ANCHOR 사용자 주문 목록 조회
   */
  async getOrders(userId: number): Promise<Order[]> {
    return await this.orderRepository.findManyByUserId(userId);
  }
}
