import type { Producer } from 'kafkajs';
import { KafkaEventBus } from '@common/kafka/kafka.event-bus';
import { TimeoutException } from '@common/resilience/resilience.exception';
import { createTestConfig } from '../helpers/test-config';

describe('KafkaEventBus', () => {
  let send: jest.Mock;
  let eventBus: KafkaEventBus;

  beforeEach(() => {
    send = jest.fn();
    const producer = { send } as unknown as Producer;
    eventBus = new KafkaEventBus(
      producer,
      createTestConfig({ KAFKA_PUBLISH_TIMEOUT_MS: '50' }),
    );
  });

  it('given: 브로커 응답 / when: publish / then: acks=-1로 전송하고 partition/offset을 반환함', async () => {
    // given
    send.mockResolvedValue([
      { topicName: 'order-events', partition: 2, errorCode: 0, baseOffset: '41' },
    ]);

    // when
    const ack = await eventBus.publish(
      'order-events',
      '7',
      { eventType: 'ORDER_CREATED', orderId: 7 },
      { 'event-type': 'ORDER_CREATED' },
    );

    // then
    expect(ack).toEqual({ topic: 'order-events', partition: 2, offset: '41' });
    expect(send).toHaveBeenCalledWith({
      topic: 'order-events',
      acks: -1,
      timeout: 50,
      messages: [
        {
          key: '7',
          value: '{"eventType":"ORDER_CREATED","orderId":7}',
          headers: { 'event-type': 'ORDER_CREATED' },
        },
      ],
    });
  });

  it('given: 메타데이터 없는 응답 / when: publish / then: partition 0, offset null', async () => {
    send.mockResolvedValue([]);

    await expect(
      eventBus.publish('idempotency-keys', 'k1', { idempotencyKey: 'k1' }),
    ).resolves.toEqual({ topic: 'idempotency-keys', partition: 0, offset: null });
  });

  it('given: 브로커 에러 / when: publish / then: 에러가 전파됨', async () => {
    send.mockRejectedValue(new Error('broker unavailable'));

    await expect(
      eventBus.publish('order-events', '7', { orderId: 7 }),
    ).rejects.toThrow('broker unavailable');
  });

  it('given: 응답 없는 브로커 / when: publish / then: TimeoutException', async () => {
    send.mockReturnValue(new Promise(() => undefined));

    await expect(
      eventBus.publish('order-events', '7', { orderId: 7 }),
    ).rejects.toBeInstanceOf(TimeoutException);
  });
});
