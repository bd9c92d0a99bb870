import { Logger } from '@nestjs/common';
import axios, { AxiosError, AxiosInstance, AxiosResponse } from 'axios';
import { AppConfig } from '@common/config/app.config';
import { CallCancelledException } from '@common/resilience/resilience.exception';
import {
  CaptureOptions,
  GatewayResponse,
  IPaymentGatewayClient,
} from '../domain/interfaces/payment-gateway.interface';
import {
  PaymentGatewayRejectedException,
  PaymentGatewayUnavailableException,
} from '../domain/exceptions/payment-gateway.exception';

interface CaptureResponseBody {
  status: 'APPROVED' | 'DECLINED';
  transactionId?: string;
  reason?: string;
}

const isCaptureResponseBody = (value: unknown): value is CaptureResponseBody =>
  typeof value === 'object' &&
  value !== null &&
  'status' in value &&
  (value.status === 'APPROVED' || value.status === 'DECLINED') &&
  (!('transactionId' in value) ||
    value.transactionId === undefined ||
    typeof value.transactionId === 'string') &&
  (!('reason' in value) ||
    value.reason === undefined ||
    typeof value.reason === 'string');

const reasonOf = (data: unknown): string | undefined =>
  typeof data === 'object' &&
  data !== null &&
  'reason' in data &&
  typeof data.reason === 'string'
    ? data.reason
    : undefined;

/**
 * REST 결제 게이트웨이 클라이언트
 * POST /payments/captures { orderId }
 */
export class HttpPaymentGatewayClient implements IPaymentGatewayClient {
  private readonly logger = new Logger(HttpPaymentGatewayClient.name);

  constructor(
    private readonly http: AxiosInstance,
    readonly name: string,
  ) {}

  static create(config: AppConfig): HttpPaymentGatewayClient {
    const http = axios.create({
      baseURL: config.paymentGatewayUrl,
      headers: {
        'Content-Type': 'application/json',
        ...(config.paymentGatewayApiKey
          ? { Authorization: `Bearer ${config.paymentGatewayApiKey}` }
          : {}),
      },
    });
    return new HttpPaymentGatewayClient(http, config.paymentGatewayName);
  }

  async capture(
    orderId: number,
    options: CaptureOptions,
  ): Promise<GatewayResponse> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.post<unknown>(
        '/payments/captures',
        { orderId },
        { signal: options.signal },
      );
    } catch (error) {
      throw this.translate(error);
    }

    return this.parse(orderId, response.data);
  }

  private parse(orderId: number, data: unknown): GatewayResponse {
    if (!isCaptureResponseBody(data)) {
      this.logger.warn(`[결제] 해석할 수 없는 응답 - orderId: ${orderId}`);
      throw new PaymentGatewayUnavailableException(
        'Malformed payment gateway response',
      );
    }

    if (data.status === 'DECLINED') {
      return { approved: false, message: data.reason ?? 'declined by gateway' };
    }

    if (!data.transactionId) {
      throw new PaymentGatewayUnavailableException(
        'Approved payment without transaction id',
      );
    }
    return { approved: true, transactionId: data.transactionId };
  }

  private translate(error: unknown): Error {
    if (axios.isCancel(error)) {
      return new CallCancelledException();
    }

    if (error instanceof AxiosError) {
      const status = error.response?.status;
      if (status !== undefined && status >= 400 && status < 500 && status !== 429) {
        return new PaymentGatewayRejectedException(
          reasonOf(error.response?.data) ??
            `Payment gateway rejected the request (${status})`,
          status,
        );
      }
      return new PaymentGatewayUnavailableException(
        `Payment gateway unavailable (${status ?? error.code ?? 'network'})`,
        status,
      );
    }

    return error instanceof Error ? error : new Error(String(error));
  }
}
