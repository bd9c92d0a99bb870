/**
 * Order Domain Types
 * 주문 도메인에서 공통으로 사용되는 타입 정의
 */

export const RESOURCE_TYPE_ORDER = 'order';

/**
 * order-events 토픽으로 발행되는 이벤트 유형
 */
export enum OrderEventType {
  ORDER_CREATED = 'ORDER_CREATED',
  ORDER_PAID = 'ORDER_PAID',
  ORDER_PAYMENT_FAILED = 'ORDER_PAYMENT_FAILED',
  ORDER_CANCELLED = 'ORDER_CANCELLED',
  ORDER_SHIPPED = 'ORDER_SHIPPED',
}

/**
 * 인증 계층에서 전달받는 사용자 정보
 */
export interface AuthenticatedUser {
  id: number;
}
