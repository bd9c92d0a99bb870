import { Inject, Injectable, Logger } from '@nestjs/common';
import { Semaphore } from 'async-mutex';
import { CircuitBreaker, CallOutcome } from '@common/resilience/circuit-breaker';
import { CircuitBreakerRegistry } from '@common/resilience/circuit-breaker.registry';
import { promiseTimeout } from '@common/resilience/promise-timeout';
import { retryWithBackoff } from '@common/resilience/retry';
import { isTransientError } from '@common/resilience/transient-error';
import {
  CallCancelledException,
  CircuitBreakerOpenException,
} from '@common/resilience/resilience.exception';
import {
  ApplicationException,
  DomainException,
  ValidationException,
} from '@common/exception';
import {
  PaymentResult,
  PaymentResults,
} from '../domain/entities/payment-result';
import {
  GatewayResponse,
  IPaymentGatewayClient,
} from '../domain/interfaces/payment-gateway.interface';
import { PaymentGatewayRejectedException } from '../domain/exceptions/payment-gateway.exception';
import {
  PAYMENT_RESILIENCE_OPTIONS,
  PaymentResilienceOptions,
} from '../payment.constants';

export interface ProcessPaymentOptions {
  signal?: AbortSignal;
}

/**
 * 요청 자체의 문제이거나 호출자가 취소한 경우는 게이트웨이 건강 상태와 무관
 */
const classifyForBreaker = (error: unknown): Exclude<CallOutcome, 'success'> =>
  error instanceof CallCancelledException ||
  error instanceof PaymentGatewayRejectedException ||
  error instanceof ValidationException ||
  error instanceof DomainException ||
  error instanceof ApplicationException
    ? 'ignored'
    : 'failure';

/**
 * PaymentOrchestrator
 *
 * 외부 결제 게이트웨이 호출을 보호하는 계층
 * - 동시 실행 상한 (Semaphore, 대기 중 취소 가능) -> 재시도 -> Circuit Breaker -> 시도별 타임아웃 -> 게이트웨이
 * - Breaker는 재시도 안쪽에 있으므로 시도 1회가 호출 1건으로 기록된다
 * - 결과는 항상 PaymentResult로 resolve되며 reject되지 않는다
 */
@Injectable()
export class PaymentOrchestrator {
  private readonly logger = new Logger(PaymentOrchestrator.name);
  private readonly breaker: CircuitBreaker;
  private readonly executor: Semaphore;

  constructor(
    private readonly gateway: IPaymentGatewayClient,
    registry: CircuitBreakerRegistry,
    @Inject(PAYMENT_RESILIENCE_OPTIONS)
    private readonly options: PaymentResilienceOptions,
  ) {
    this.breaker = registry.getOrCreate(
      options.gatewayName,
      options.serviceName,
      { ...options.circuitBreaker, classifyError: classifyForBreaker },
    );
    this.executor = new Semaphore(options.maxConcurrency);
  }

  getCircuitBreaker(): CircuitBreaker {
    return this.breaker;
  }

  /**
   * ANCHOR 결제 처리
   * - 승인: { success: true, transactionId }
   * - 승인 거절: DECLINED / 요청 거부: REJECTED / 호출자 취소: CANCELLED
   * - 그 외 모든 실패: fallback (UNAVAILABLE)
   */
  async processPayment(
    orderId: number,
    options: ProcessPaymentOptions = {},
  ): Promise<PaymentResult> {
    const { signal } = options;

    if (signal?.aborted) {
      return PaymentResults.cancelled();
    }

    try {
      const release = await this.acquirePermit(signal);
      try {
        const response = await this.captureWithResilience(orderId, signal);
        return this.toResult(orderId, response);
      } finally {
        release();
      }
    } catch (error) {
      return this.toFailure(orderId, error, signal);
    }
  }

  /**
   * 동시 실행 슬롯 획득
   * - 대기 중 호출자가 취소하면 즉시 CallCancelledException
   * - 취소 이후 늦게 얻은 슬롯은 바로 반납
   */
  private acquirePermit(signal?: AbortSignal): Promise<() => void> {
    const acquiring = this.executor.acquire();

    return new Promise<() => void>((resolve, reject) => {
      const onAbort = () => reject(new CallCancelledException());
      signal?.addEventListener('abort', onAbort, { once: true });

      acquiring.then(
        ([, release]) => {
          signal?.removeEventListener('abort', onAbort);
          if (signal?.aborted) {
            release();
            reject(new CallCancelledException());
            return;
          }
          resolve(release);
        },
        (error: unknown) => {
          signal?.removeEventListener('abort', onAbort);
          reject(error);
        },
      );
    });
  }

  private captureWithResilience(
    orderId: number,
    signal?: AbortSignal,
  ): Promise<GatewayResponse> {
    const { retry, timeoutMs } = this.options;

    return retryWithBackoff(
      (attempt) =>
        this.breaker.execute(() => {
          if (signal?.aborted) {
            throw new CallCancelledException();
          }
          this.logger.debug(
            `[결제] 게이트웨이 호출 - orderId: ${orderId}, attempt: ${attempt}`,
          );
          return promiseTimeout(
            (attemptSignal) =>
              this.gateway.capture(orderId, { signal: attemptSignal }),
            timeoutMs,
            {
              message: `Payment capture timed out - orderId: ${orderId}`,
              signal,
            },
          );
        }),
      {
        ...retry,
        isRetryable: isTransientError,
        signal,
        onRetry: (attempt, error, delayMs) =>
          this.logger.warn(
            `[결제] 재시도 예정 - orderId: ${orderId}, attempt: ${attempt}, delay: ${delayMs}ms, cause: ${this.describe(error)}`,
          ),
      },
    );
  }

  private toResult(orderId: number, response: GatewayResponse): PaymentResult {
    if (response.approved) {
      this.logger.log(
        `[결제] 승인 - orderId: ${orderId}, transactionId: ${response.transactionId}`,
      );
      return PaymentResults.approved(response.transactionId);
    }

    this.logger.log(
      `[결제] 승인 거절 - orderId: ${orderId}, message: ${response.message}`,
    );
    return PaymentResults.declined(response.message);
  }

  private toFailure(
    orderId: number,
    error: unknown,
    signal?: AbortSignal,
  ): PaymentResult {
    if (error instanceof CallCancelledException || signal?.aborted) {
      this.logger.log(`[결제] 호출자 취소 - orderId: ${orderId}`);
      return PaymentResults.cancelled();
    }

    if (error instanceof PaymentGatewayRejectedException) {
      this.logger.warn(
        `[결제] 요청 거부 - orderId: ${orderId}, status: ${error.status}, message: ${error.message}`,
      );
      return PaymentResults.rejected(error.message);
    }

    if (error instanceof CircuitBreakerOpenException) {
      this.logger.warn(
        `[결제] Circuit OPEN - fallback 응답 - orderId: ${orderId}, retryAfter: ${error.retryAfterMs}ms`,
      );
    } else {
      this.logger.error(
        `[결제] 게이트웨이 호출 실패 - fallback 응답 - orderId: ${orderId}`,
        error,
      );
    }
    return PaymentResults.fallback();
  }

  private describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}
