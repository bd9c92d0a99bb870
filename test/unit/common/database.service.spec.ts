import { DataSource, EntityManager } from 'typeorm';
import { DatabaseService } from '@common/database-manager/database.service';

describe('DatabaseService', () => {
  const defaultManager = { name: 'default' } as unknown as EntityManager;
  const txManager = { name: 'transaction' } as unknown as EntityManager;

  let transaction: jest.Mock;
  let databaseService: DatabaseService;

  beforeEach(() => {
    transaction = jest.fn(
      (work: (manager: EntityManager) => Promise<unknown>) => work(txManager),
    );
    const dataSource = {
      manager: defaultManager,
      transaction,
    } as unknown as DataSource;
    databaseService = new DatabaseService(dataSource);
  });

  it('트랜잭션 밖에서는 기본 EntityManager를 반환한다', () => {
    expect(databaseService.getManager()).toBe(defaultManager);
    expect(databaseService.getTransactionManager()).toBeNull();
  });

  it('트랜잭션 안에서는 트랜잭션 EntityManager를 반환한다', async () => {
    // When
    const managers = await databaseService.runInTransaction(async () => [
      databaseService.getManager(),
      databaseService.getTransactionManager(),
    ]);

    // Then
    expect(managers).toEqual([txManager, txManager]);
    expect(databaseService.getManager()).toBe(defaultManager);
  });

  it('중첩된 runInTransaction은 바깥 트랜잭션에 참여한다', async () => {
    // When
    const result = await databaseService.runInTransaction(() =>
      databaseService.runInTransaction(async () => 'nested'),
    );

    // Then
    expect(result).toBe('nested');
    expect(transaction).toHaveBeenCalledTimes(1);
  });

  it('핸들러 에러를 그대로 전파한다', async () => {
    await expect(
      databaseService.runInTransaction(async () => {
        throw new Error('rollback');
      }),
    ).rejects.toThrow('rollback');
  });
});
