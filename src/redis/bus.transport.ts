import { BusTransport } from '@/types/publisher.types';
import { REDIS_KEY_PREFIX } from '@/config/constants';
import { EngineError } from '@/utils/errors';
import { RedisClient, redisClient } from './client';

/**
 * Pub/sub transport over Redis channels. Topics map one-to-one onto channel
 * names, optionally under a deployment prefix.
 */
export class RedisBusTransport implements BusTransport {
  constructor(
    private readonly client: RedisClient = redisClient,
    private readonly prefix: string = REDIS_KEY_PREFIX.BUS,
  ) {}

  async publish(topic: string, payload: string): Promise<void> {
    const channel = this.prefix ? `${this.prefix}:${topic}` : topic;
    const result = await this.client.publish(channel, payload);
    if (!result.success) {
      throw new EngineError('PUBLISH_FAILURE', result.error?.message ?? 'Publish failed', { topic });
    }
  }
}
