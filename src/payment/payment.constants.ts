import { AppConfig } from '@common/config/app.config';
import { CircuitBreakerSettings } from '@common/resilience/circuit-breaker.registry';

export const PAYMENT_RESILIENCE_OPTIONS = Symbol('PAYMENT_RESILIENCE_OPTIONS');

export interface PaymentResilienceOptions {
  gatewayName: string;
  serviceName: string;
  /** 시도 1회 당 deadline */
  timeoutMs: number;
  maxConcurrency: number;
  retry: {
    maxAttempts: number;
    waitDurationMs: number;
    backoffMultiplier: number;
    maxWaitDurationMs: number;
  };
  circuitBreaker: Omit<CircuitBreakerSettings, 'classifyError'>;
}

export const paymentResilienceOptionsFrom = (
  config: AppConfig,
): PaymentResilienceOptions => ({
  gatewayName: config.paymentGatewayName,
  serviceName: config.paymentServiceName,
  timeoutMs: config.paymentTimeoutMs,
  maxConcurrency: config.paymentMaxConcurrency,
  retry: {
    maxAttempts: config.paymentRetryMaxAttempts,
    waitDurationMs: config.paymentRetryWaitMs,
    backoffMultiplier: config.paymentRetryBackoffMultiplier,
    maxWaitDurationMs: config.paymentRetryMaxWaitMs,
  },
  circuitBreaker: {
    failureRateThreshold: config.paymentCbFailureRateThreshold,
    slidingWindowSize: config.paymentCbSlidingWindowSize,
    minimumNumberOfCalls: config.paymentCbMinimumCalls,
    waitDurationInOpenStateMs: config.paymentCbOpenWaitMs,
    permittedNumberOfCallsInHalfOpenState:
      config.paymentCbHalfOpenPermittedCalls,
    successThresholdInHalfOpenState: config.paymentCbHalfOpenSuccessThreshold,
  },
});
