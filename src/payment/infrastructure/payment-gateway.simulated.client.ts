import { sleep } from '@common/resilience/promise-timeout';
import {
  CaptureOptions,
  GatewayResponse,
  IPaymentGatewayClient,
} from '../domain/interfaces/payment-gateway.interface';

/**
 * 게이트웨이 URL이 없을 때 사용하는 시뮬레이션 클라이언트
 * 고정 지연 후 항상 승인
 */
export class SimulatedPaymentGatewayClient implements IPaymentGatewayClient {
  readonly name = 'simulated';

  constructor(
    private readonly latencyMs: number,
    private readonly clock: () => number = () => Date.now(),
  ) {}

  async capture(
    _orderId: number,
    options: CaptureOptions,
  ): Promise<GatewayResponse> {
    await sleep(this.latencyMs, options.signal);
    return { approved: true, transactionId: `TXN-${this.clock()}` };
  }
}
