import { Logger } from '@nestjs/common';
import { CircuitBreakerRegistry } from '@common/resilience/circuit-breaker.registry';
import { CircuitState } from '@common/resilience/circuit-breaker';

describe('CircuitBreakerRegistry', () => {
  const settings = {
    failureRateThreshold: 50,
    slidingWindowSize: 2,
    minimumNumberOfCalls: 2,
    waitDurationInOpenStateMs: 1000,
    permittedNumberOfCallsInHalfOpenState: 1,
    successThresholdInHalfOpenState: 1,
  };

  let registry: CircuitBreakerRegistry;

  beforeEach(() => {
    registry = new CircuitBreakerRegistry();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('given: 같은 gateway/service / when: getOrCreate 두 번 / then: 같은 인스턴스를 반환함', () => {
    const first = registry.getOrCreate('pg', 'payment', settings);
    const second = registry.getOrCreate('pg', 'payment', {
      ...settings,
      slidingWindowSize: 100,
    });

    expect(second).toBe(first);
    expect(first.name).toBe('pg:payment');
    expect(registry.find('pg', 'payment')).toBe(first);
  });

  it('given: 다른 service / when: getOrCreate / then: 별도의 breaker', () => {
    const payment = registry.getOrCreate('pg', 'payment', settings);
    const refund = registry.getOrCreate('pg', 'refund', settings);

    expect(refund).not.toBe(payment);
    expect(registry.find('pg', 'unknown')).toBeUndefined();
  });

  it('given: 등록된 breaker / when: 상태 전이 / then: warn 로그를 남김', async () => {
    const warn = jest
      .spyOn(Logger.prototype, 'warn')
      .mockImplementation(() => undefined);
    const breaker = registry.getOrCreate('pg', 'payment', settings);

    for (let i = 0; i < 2; i++) {
      await breaker
        .execute(async () => {
          throw new Error('down');
        })
        .catch(() => undefined);
    }

    expect(breaker.getState()).toBe(CircuitState.OPEN);
    expect(warn).toHaveBeenCalledWith('[CircuitBreaker] pg:payment CLOSED -> OPEN');
  });

  it('given: OPEN breaker / when: resetAll / then: 모두 CLOSED', async () => {
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    const breaker = registry.getOrCreate('pg', 'payment', settings);
    for (let i = 0; i < 2; i++) {
      await breaker
        .execute(async () => {
          throw new Error('down');
        })
        .catch(() => undefined);
    }

    await registry.resetAll();

    expect(breaker.getState()).toBe(CircuitState.CLOSED);
  });
});
