import { Injectable } from '@nestjs/common';
import { IOrderRepository } from '../domain/interfaces/order.repository.interface';
import { Order } from '../domain/entities/order.entity';

export interface OrderMemorySnapshot {
  orders: Map<number, Order>;
  currentId: number;
}

/**
 * Order Repository Implementation (In-Memory)
 * 저장/조회 시 복사본을 주고받아 호출자 쪽 변경이 update 전에 새지 않도록 한다.
 */
@Injectable()
export class OrderMemoryRepository implements IOrderRepository {
  private orders: Map<number, Order> = new Map();
  private currentId = 1;

  // ANCHOR findById
  async findById(id: number): Promise<Order | null> {
    const order = this.orders.get(id);
    return order ? this.copy(order) : null;
  }

  // ANCHOR findByOrderNumber
  async findByOrderNumber(orderNumber: string): Promise<Order | null> {
    const order = [...this.orders.values()].find(
      (candidate) => candidate.orderNumber === orderNumber,
    );
    return order ? this.copy(order) : null;
  }

  // ANCHOR findManyByUserId
  async findManyByUserId(userId: number): Promise<Order[]> {
    return Array.from(this.orders.values())
      .filter((order) => order.userId === userId)
      .sort(
        (a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id,
      )
      .map((order) => this.copy(order));
  }

  // ANCHOR create
  async create(order: Order): Promise<Order> {
    const duplicated = [...this.orders.values()].some(
      (existing) => existing.orderNumber === order.orderNumber,
    );
    if (duplicated) {
      throw new Error(`Duplicate order number: ${order.orderNumber}`);
    }

    const newOrder = this.copy(order, this.currentId++);
    this.orders.set(newOrder.id, newOrder);
    return this.copy(newOrder);
  }

  // ANCHOR update
  async update(order: Order): Promise<Order> {
    if (!this.orders.has(order.id)) {
      throw new Error(`Order not found: ${order.id}`);
    }
    this.orders.set(order.id, this.copy(order));
    return order;
  }

  count(): number {
    return this.orders.size;
  }

  snapshot(): OrderMemorySnapshot {
    return { orders: new Map(this.orders), currentId: this.currentId };
  }

  restore(snapshot: OrderMemorySnapshot): void {
    this.orders = new Map(snapshot.orders);
    this.currentId = snapshot.currentId;
  }

  private copy(order: Order, id: number = order.id): Order {
    return new Order(
      id,
      order.orderNumber,
      order.userId,
      order.status,
      order.subtotal,
      order.total,
      order.createdAt,
      order.updatedAt,
    );
  }
}
