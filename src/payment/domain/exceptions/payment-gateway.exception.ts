import { TransientException } from '@common/resilience/resilience.exception';

// 5xx, 429, 네트워크 장애, 해석할 수 없는 응답
export class PaymentGatewayUnavailableException extends TransientException {
  constructor(
    message: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'PaymentGatewayUnavailableException';
    Object.setPrototypeOf(this, PaymentGatewayUnavailableException.prototype);
  }
}

// 4xx - 재시도해도 결과가 같다
export class PaymentGatewayRejectedException extends Error {
  constructor(
    message: string,
    public readonly status: number,
  ) {
    super(message);
    this.name = 'PaymentGatewayRejectedException';
    Object.setPrototypeOf(this, PaymentGatewayRejectedException.prototype);
  }
}
