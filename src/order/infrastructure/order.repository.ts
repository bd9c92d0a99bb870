import { Injectable } from '@nestjs/common';
import { Repository } from 'typeorm';
import { AppConfig } from '@common/config/app.config';
import { DatabaseService } from '@common/database-manager/database.service';
import { ErrorCode, RepositoryException } from '@common/exception';
import { promiseTimeout } from '@common/resilience/promise-timeout';
import { TimeoutException } from '@common/resilience/resilience.exception';
import { IOrderRepository } from '../domain/interfaces/order.repository.interface';
import { Order } from '@/order/domain/entities/order.entity';
import { OrderStatus } from '@/order/domain/entities/order-status.vo';
import { OrderOrmEntity } from './entities/order.orm-entity';

/**
 * Order Repository Implementation (TypeORM)
 * - 모든 호출은 ORDER_STORE_TIMEOUT_MS 안에 끝나야 한다
 * - 드라이버 에러는 RepositoryException(ORDER_STORE_FAILURE)로 감싼다
 */
@Injectable()
export class OrderRepository implements IOrderRepository {
  constructor(
    private readonly databaseService: DatabaseService,
    private readonly config: AppConfig,
  ) {}

  private get repository(): Repository<OrderOrmEntity> {
    return this.databaseService.getManager().getRepository(OrderOrmEntity);
  }

  // ANCHOR findById
  async findById(id: number): Promise<Order | null> {
    // 트랜잭션 컨텍스트가 있으면 FOR UPDATE 사용
    const inTransaction = this.databaseService.getTransactionManager() !== null;

    const record = await this.run('findById', (repository) =>
      repository.findOne({
        where: { id },
        lock: inTransaction ? { mode: 'pessimistic_write' } : undefined,
      }),
    );
    return record ? this.mapToDomain(record) : null;
  }

  // ANCHOR findByOrderNumber
  async findByOrderNumber(orderNumber: string): Promise<Order | null> {
    const record = await this.run('findByOrderNumber', (repository) =>
      repository.findOne({ where: { orderNumber } }),
    );
    return record ? this.mapToDomain(record) : null;
  }

  // ANCHOR findManyByUserId
  async findManyByUserId(userId: number): Promise<Order[]> {
    const records = await this.run('findManyByUserId', (repository) =>
      repository.find({
        where: { userId },
        order: { createdAt: 'DESC', id: 'DESC' },
      }),
    );
    return records.map((record) => this.mapToDomain(record));
  }

  // ANCHOR create
  async create(order: Order): Promise<Order> {
    const created = await this.run('create', (repository) =>
      repository.save(
        repository.create({
          orderNumber: order.orderNumber,
          userId: order.userId,
          status: order.status.value,
          subtotal: order.subtotal,
          total: order.total,
          createdAt: order.createdAt,
          updatedAt: order.updatedAt,
        }),
      ),
    );
    return this.mapToDomain(created);
  }

  // ANCHOR update
  async update(order: Order): Promise<Order> {
    await this.run('update', (repository) =>
      repository.update(
        { id: order.id },
        {
          status: order.status.value,
          subtotal: order.subtotal,
          total: order.total,
          updatedAt: order.updatedAt,
        },
      ),
    );
    return order;
  }

  private async run<T>(
    operation: string,
    work: (repository: Repository<OrderOrmEntity>) => Promise<T>,
  ): Promise<T> {
    try {
      return await promiseTimeout(
        () => work(this.repository),
        this.config.orderStoreTimeoutMs,
        { message: `Order store ${operation} timed out` },
      );
    } catch (error) {
      if (error instanceof TimeoutException) {
        throw error;
      }
      throw new RepositoryException(
        ErrorCode.ORDER_STORE_FAILURE,
        error instanceof Error ? error : undefined,
      );
    }
  }

  private mapToDomain(record: OrderOrmEntity): Order {
    return new Order(
      record.id,
      record.orderNumber,
      record.userId,
      OrderStatus.from(record.status),
      record.subtotal,
      record.total,
      record.createdAt,
      record.updatedAt,
    );
  }
}
