export type GatewayResponse =
  | { approved: true; transactionId: string }
  | { approved: false; message: string };

export interface CaptureOptions {
  signal?: AbortSignal;
}

/**
 * Payment Gateway Port
 * - 일시 장애: PaymentGatewayUnavailableException
 * - 요청 자체가 거부됨: PaymentGatewayRejectedException
 * - 승인 거절은 예외가 아니라 approved: false
 */
export abstract class IPaymentGatewayClient {
  abstract readonly name: string;
  abstract capture(
    orderId: number,
    options: CaptureOptions,
  ): Promise<GatewayResponse>;
}
