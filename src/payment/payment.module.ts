import { Logger, Module } from '@nestjs/common';
import { AppConfig } from '@common/config/app.config';
import { PaymentOrchestrator } from './application/payment.orchestrator';
import { IPaymentGatewayClient } from './domain/interfaces/payment-gateway.interface';
import { HttpPaymentGatewayClient } from './infrastructure/payment-gateway.http.client';
import { SimulatedPaymentGatewayClient } from './infrastructure/payment-gateway.simulated.client';
import {
  PAYMENT_RESILIENCE_OPTIONS,
  paymentResilienceOptionsFrom,
} from './payment.constants';

/**
 * Payment Module
 * 외부 결제 게이트웨이 호출과 보호 정책 (retry / circuit breaker / timeout)
 */
@Module({
  providers: [
    {
      provide: PAYMENT_RESILIENCE_OPTIONS,
      useFactory: paymentResilienceOptionsFrom,
      inject: [AppConfig],
    },
    {
      provide: IPaymentGatewayClient,
      useFactory: (config: AppConfig): IPaymentGatewayClient => {
        if (config.paymentGatewayUrl) {
          return HttpPaymentGatewayClient.create(config);
        }
        new Logger('PaymentModule').warn(
          'PAYMENT_GATEWAY_URL is not set. Simulated payment gateway will be used.',
        );
        return new SimulatedPaymentGatewayClient(
          config.paymentSimulatedLatencyMs,
        );
      },
      inject: [AppConfig],
    },
    PaymentOrchestrator,
  ],
  exports: [PaymentOrchestrator],
})
export class PaymentModule {}
