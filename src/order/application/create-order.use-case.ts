import { Injectable, Logger } from '@nestjs/common';
import { AppConfig } from '@common/config/app.config';
import { ITransactionManager } from '@common/database-manager/transaction-manager.interface';
import { ILockManager } from '@common/lock-manager/lock-manager.interface';
import {
  ApplicationException,
  ErrorCode,
  ValidationException,
} from '@common/exception';
import { OrderDomainService } from '@/order/domain/services/order.service';
import { Order } from '@/order/domain/entities/order.entity';
import {
  AuthenticatedUser,
  OrderEventType,
  RESOURCE_TYPE_ORDER,
} from '@/order/domain/entities/order.types';
import { OrderKafkaProducer } from '@/order/infrastructure/order.kafka.producer';
import { IIdempotencyLedger } from '@/idempotency/domain/interfaces/idempotency-ledger.interface';
import { IdempotencyKey } from '@/idempotency/domain/entities/idempotency-key.vo';
import { IdempotencyRecord } from '@/idempotency/domain/entities/idempotency-record.entity';
import { sleep } from '@common/resilience/promise-timeout';

const WINNER_POLL_INTERVAL_MS = 50;

// 트랜잭션 안에서 등록 경합에 진 경우 롤백을 일으키기 위한 신호
class IdempotencyConflictSignal extends Error {
  constructor(public readonly winner: IdempotencyRecord) {
    super(`Idempotency key already registered: ${winner.idempotencyKey}`);
    this.name = 'IdempotencyConflictSignal';
    Object.setPrototypeOf(this, IdempotencyConflictSignal.prototype);
  }
}

@Injectable()
export class CreateOrderUseCase {
  private readonly logger = new Logger(CreateOrderUseCase.name);

  constructor(
    private readonly orderService: OrderDomainService,
    private readonly idempotencyLedger: IIdempotencyLedger,
    private readonly lockManager: ILockManager,
    private readonly transactionManager: ITransactionManager,
    private readonly orderKafkaProducer: OrderKafkaProducer,
    private readonly config: AppConfig,
  ) {}

  /**
   * ANCHOR 주문 생성
   *
   * 멱등성 키가 있으면:
   * 1) 키 단위 락 획득 (idempotency:order:{key})
   * 2) 살아있는 레코드가 있으면 해당 주문 반환
   * 3) 없으면 하나의 트랜잭션에서 주문 저장 + 원장 등록
   *    - 등록 경합에 지면 롤백 후 선점한 주문 반환 (커밋될 때까지 제한 시간 대기)
   *    - 커밋 실패 시 등록한 레코드 해제
   * 4) 커밋 후 ORDER_CREATED, 멱등성 키 이벤트 발행 (실패해도 주문은 유지)
   */
  async execute(
    user: AuthenticatedUser | null | undefined,
    idempotencyKey?: string | null,
  ): Promise<Order> {
    const userId = this.validateUser(user);

    if (
      idempotencyKey === undefined ||
      idempotencyKey === null ||
      idempotencyKey === ''
    ) {
      const order = await this.transactionManager.runInTransaction(() =>
        this.orderService.createPendingOrder(userId),
      );
      this.logger.log(
        `[주문생성] 완료 - orderId: ${order.id}, userId: ${userId}`,
      );
      await this.publishOrderCreated(order, null);
      return order;
    }

    const key = IdempotencyKey.of(idempotencyKey).getValue();

    return this.lockManager.withLock(
      `idempotency:order:${key}`,
      () => this.createIdempotently(userId, key),
      {
        waitTimeout: this.config.idempotencyLockWaitMs,
        ttl: this.config.idempotencyLockTtlMs,
      },
    );
  }

  private async createIdempotently(
    userId: number,
    key: string,
  ): Promise<Order> {
    const existing = await this.findExistingOrder(userId, key);
    if (existing) {
      this.logger.log(
        `[주문생성] 멱등성 키 재사용 - key: ${key}, orderId: ${existing.id}`,
      );
      return existing;
    }

    const registration: { record: IdempotencyRecord | null } = { record: null };

    let order: Order;
    try {
      order = await this.transactionManager.runInTransaction(async () => {
        const created = await this.orderService.createPendingOrder(userId);

        const result = await this.idempotencyLedger.register(
          key,
          RESOURCE_TYPE_ORDER,
          String(created.id),
          this.config.idempotencyTtlMs,
        );
        if (result.outcome === 'conflict') {
          throw new IdempotencyConflictSignal(result.record);
        }

        registration.record = result.record;
        return created;
      });
    } catch (error) {
      if (error instanceof IdempotencyConflictSignal) {
        this.logger.warn(
          `[주문생성] 멱등성 키 등록 경합 - key: ${key}, winner: ${error.winner.resourceId}`,
        );
        return this.resolveWinner(userId, error.winner);
      }

      if (registration.record) {
        await this.compensate(registration.record);
      }
      throw error;
    }

    this.logger.log(
      `[주문생성] 완료 - orderId: ${order.id}, userId: ${userId}, key: ${key}`,
    );

    await this.publishOrderCreated(order, key);
    if (registration.record) {
      await this.publishIdempotencyRegistered(registration.record);
    }
    return order;
  }

  /**
   * 살아있는 레코드가 가리키는 주문 조회
   * 주문이 없는 레코드는 해제하고 없는 것으로 취급한다.
   */
  private async findExistingOrder(
    userId: number,
    key: string,
  ): Promise<Order | null> {
    const record = await this.idempotencyLedger.lookup(key);
    if (!record) {
      return null;
    }
    this.validateResourceType(record);

    const order = await this.orderService.findOrder(Number(record.resourceId));
    if (!order) {
      this.logger.warn(
        `[주문생성] 주문이 없는 멱등성 레코드 해제 - key: ${key}, resourceId: ${record.resourceId}`,
      );
      await this.idempotencyLedger.release(key, record.resourceId);
      return null;
    }

    this.validateRequester(order, userId);
    return order;
  }

  private async resolveWinner(
    userId: number,
    winner: IdempotencyRecord,
  ): Promise<Order> {
    this.validateResourceType(winner);

    const order = await this.waitForWinner(winner);
    this.validateRequester(order, userId);
    return order;
  }

  /**
   * 선점한 쪽 트랜잭션이 커밋되어 주문이 보일 때까지 대기
   * - 최대 IDEMPOTENCY_LOCK_WAIT_MS, 초과 시 IDEMPOTENCY_KEY_IN_PROGRESS
   */
  private async waitForWinner(winner: IdempotencyRecord): Promise<Order> {
    const orderId = Number(winner.resourceId);
    const deadline = Date.now() + this.config.idempotencyLockWaitMs;

    for (;;) {
      const order = await this.orderService.findOrder(orderId);
      if (order) {
        return order;
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        this.logger.warn(
          `[주문생성] 선점한 주문이 보이지 않음 - key: ${winner.idempotencyKey}, resourceId: ${winner.resourceId}`,
        );
        throw new ApplicationException(ErrorCode.IDEMPOTENCY_KEY_IN_PROGRESS);
      }
      await sleep(Math.min(WINNER_POLL_INTERVAL_MS, remaining));
    }
  }

  private async compensate(record: IdempotencyRecord): Promise<void> {
    try {
      const released = await this.idempotencyLedger.release(
        record.idempotencyKey,
        record.resourceId,
      );
      this.logger.warn(
        `[주문생성] 주문 저장 실패로 멱등성 레코드 해제 - key: ${record.idempotencyKey}, released: ${released}`,
      );
    } catch (error) {
      this.logger.error(
        `[주문생성] 멱등성 레코드 해제 실패 - key: ${record.idempotencyKey}`,
        error,
      );
    }
  }

  private validateUser(user: AuthenticatedUser | null | undefined): number {
    if (!user || !Number.isInteger(user.id) || user.id <= 0) {
      throw new ValidationException(ErrorCode.INVALID_USER);
    }
    return user.id;
  }

  private validateResourceType(record: IdempotencyRecord): void {
    if (record.resourceType !== RESOURCE_TYPE_ORDER) {
      throw new ApplicationException(ErrorCode.IDEMPOTENCY_KEY_MISMATCH);
    }
  }

  // 다른 사용자의 키 재사용
  private validateRequester(order: Order, userId: number): void {
    if (!order.isOwnedBy(userId)) {
      throw new ApplicationException(ErrorCode.IDEMPOTENCY_KEY_MISMATCH);
    }
  }

  private async publishOrderCreated(
    order: Order,
    idempotencyKey: string | null,
  ): Promise<void> {
    try {
      await this.orderKafkaProducer.publishOrderEvent(
        OrderEventType.ORDER_CREATED,
        order,
        idempotencyKey,
      );
    } catch (error) {
      this.logger.error(
        `[주문생성] ORDER_CREATED 발행 실패 - orderId: ${order.id}`,
        error,
      );
    }
  }

  private async publishIdempotencyRegistered(
    record: IdempotencyRecord,
  ): Promise<void> {
    try {
      await this.orderKafkaProducer.publishIdempotencyRegistered(record);
    } catch (error) {
      this.logger.error(
        `[주문생성] 멱등성 키 이벤트 발행 실패 - key: ${record.idempotencyKey}`,
        error,
      );
    }
  }
}
