import { EntityManager } from 'typeorm';
import { OrderRepository } from '@/order/infrastructure/order.repository';
import { OrderOrmEntity } from '@/order/infrastructure/entities/order.orm-entity';
import { Order } from '@/order/domain/entities/order.entity';
import { OrderStatus } from '@/order/domain/entities/order-status.vo';
import { DatabaseService } from '@common/database-manager/database.service';
import { ErrorCode, RepositoryException } from '@common/exception';
import { TimeoutException } from '@common/resilience/resilience.exception';
import { createTestConfig } from '../helpers/test-config';

describe('OrderRepository', () => {
  const createdAt = new Date('2024-01-01T00:00:00.000Z');

  let ormRepository: {
    findOne: jest.Mock;
    find: jest.Mock;
    create: jest.Mock;
    save: jest.Mock;
    update: jest.Mock;
  };
  let transactionManager: EntityManager | null;
  let repository: OrderRepository;

  const record = (overrides: Partial<OrderOrmEntity> = {}): OrderOrmEntity =>
    Object.assign(new OrderOrmEntity(), {
      id: 7,
      orderNumber: 'ORD-00000001-000001',
      userId: 1,
      status: 'PENDING',
      subtotal: 0,
      total: 0,
      createdAt,
      updatedAt: createdAt,
      ...overrides,
    });

  beforeEach(() => {
    ormRepository = {
      findOne: jest.fn(),
      find: jest.fn(),
      create: jest.fn((values: Partial<OrderOrmEntity>) =>
        Object.assign(new OrderOrmEntity(), values),
      ),
      save: jest.fn(),
      update: jest.fn().mockResolvedValue({ affected: 1 }),
    };
    transactionManager = null;

    const manager = {
      getRepository: () => ormRepository,
    } as unknown as EntityManager;
    const databaseService = {
      getManager: () => transactionManager ?? manager,
      getTransactionManager: () => transactionManager,
    } as unknown as DatabaseService;

    repository = new OrderRepository(
      databaseService,
      createTestConfig({ ORDER_STORE_TIMEOUT_MS: '50' }),
    );
  });

  describe('findById', () => {
    it('레코드를 도메인 엔티티로 변환한다', async () => {
      ormRepository.findOne.mockResolvedValue(record({ status: 'PAID' }));

      const order = await repository.findById(7);

      expect(order).toBeInstanceOf(Order);
      expect(order).toMatchObject({
        id: 7,
        orderNumber: 'ORD-00000001-000001',
        userId: 1,
        status: OrderStatus.PAID,
      });
      expect(ormRepository.findOne).toHaveBeenCalledWith({
        where: { id: 7 },
        lock: undefined,
      });
    });

    it('트랜잭션 안에서는 비관적 락으로 조회한다', async () => {
      transactionManager = {
        getRepository: () => ormRepository,
      } as unknown as EntityManager;
      ormRepository.findOne.mockResolvedValue(null);

      await expect(repository.findById(7)).resolves.toBeNull();
      expect(ormRepository.findOne).toHaveBeenCalledWith({
        where: { id: 7 },
        lock: { mode: 'pessimistic_write' },
      });
    });
  });

  it('create는 저장된 id로 도메인 엔티티를 반환한다', async () => {
    ormRepository.save.mockImplementation(async (entity: OrderOrmEntity) =>
      Object.assign(entity, { id: 11 }),
    );
    const order = new Order(
      0,
      'ORD-00000001-000002',
      1,
      OrderStatus.PENDING,
      0,
      0,
      createdAt,
      createdAt,
    );

    const created = await repository.create(order);

    expect(created.id).toBe(11);
    expect(ormRepository.create).toHaveBeenCalledWith({
      orderNumber: 'ORD-00000001-000002',
      userId: 1,
      status: 'PENDING',
      subtotal: 0,
      total: 0,
      createdAt,
      updatedAt: createdAt,
    });
  });

  it('update는 상태와 금액만 갱신한다', async () => {
    const order = new Order(
      7,
      'ORD-00000001-000001',
      1,
      OrderStatus.PENDING,
      0,
      0,
      createdAt,
      createdAt,
    );
    order.markPaid();

    await repository.update(order);

    expect(ormRepository.update).toHaveBeenCalledWith(
      { id: 7 },
      {
        status: 'PAID',
        subtotal: 0,
        total: 0,
        updatedAt: order.updatedAt,
      },
    );
  });

  it('findManyByUserId는 최신순 정렬을 요청한다', async () => {
    ormRepository.find.mockResolvedValue([record({ id: 2 }), record({ id: 1 })]);

    const orders = await repository.findManyByUserId(1);

    expect(orders.map((order) => order.id)).toEqual([2, 1]);
    expect(ormRepository.find).toHaveBeenCalledWith({
      where: { userId: 1 },
      order: { createdAt: 'DESC', id: 'DESC' },
    });
  });

  it('드라이버 에러는 ORDER_STORE_FAILURE로 감싼다', async () => {
    ormRepository.findOne.mockRejectedValue(new Error('ER_LOCK_DEADLOCK'));

    const error = await repository
      .findByOrderNumber('ORD-00000001-000001')
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(RepositoryException);
    expect(error).toMatchObject({
      errorCode: ErrorCode.ORDER_STORE_FAILURE,
      message: `${ErrorCode.ORDER_STORE_FAILURE.message}: ER_LOCK_DEADLOCK`,
    });
  });

  it('응답이 없으면 TimeoutException', async () => {
    ormRepository.findOne.mockReturnValue(new Promise(() => undefined));

    await expect(repository.findById(7)).rejects.toBeInstanceOf(
      TimeoutException,
    );
  });
});
