export type PaymentFailureReason =
  | 'DECLINED'
  | 'REJECTED'
  | 'UNAVAILABLE'
  | 'CANCELLED';

export type PaymentResult =
  | { success: true; transactionId: string }
  | { success: false; reason: PaymentFailureReason; message: string };

export type PaymentFailure = Extract<PaymentResult, { success: false }>;

export const PAYMENT_FALLBACK_MESSAGE =
  'payment service temporarily unavailable';

export const PaymentResults = {
  approved: (transactionId: string): PaymentResult => ({
    success: true,
    transactionId,
  }),
  declined: (message: string): PaymentFailure => ({
    success: false,
    reason: 'DECLINED',
    message,
  }),
  rejected: (message: string): PaymentFailure => ({
    success: false,
    reason: 'REJECTED',
    message,
  }),
  cancelled: (): PaymentFailure => ({
    success: false,
    reason: 'CANCELLED',
    message: 'payment cancelled by caller',
  }),
  /** 장애/차단 시 항상 같은 값 */
  fallback: (): PaymentFailure => ({
    success: false,
    reason: 'UNAVAILABLE',
    message: PAYMENT_FALLBACK_MESSAGE,
  }),
};
