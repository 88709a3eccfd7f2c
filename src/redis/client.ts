import { getRedisClient } from '@/database/redis.connection';
import { RedisOperationResult, RedisError } from '@/types/redis.types';
import { errorMessage } from '@/utils/errors';

// The slice of ioredis this service needs
export interface PublishingClient {
  publish(channel: string, message: string): Promise<number>;
  ping(): Promise<string>;
}

export class RedisClient {
  private static instance: RedisClient;
  private client: PublishingClient | null = null;

  // Tests hand in a stand-in; otherwise the shared connection is picked up on first use
  constructor(client?: PublishingClient) {
    this.client = client ?? null;
  }

  private getClient(): PublishingClient {
    if (!this.client) {
      this.client = getRedisClient();
    }
    return this.client;
  }

  public static getInstance(): RedisClient {
    if (!RedisClient.instance) {
      RedisClient.instance = new RedisClient();
    }
    return RedisClient.instance;
  }

  async publish(channel: string, message: string): Promise<RedisOperationResult<number>> {
    try {
      const receivers = await this.getClient().publish(channel, message);
      return { success: true, data: receivers };
    } catch (e) {
      const error: RedisError = { code: 'PUBLISH_FAILED', message: errorMessage(e) };
      return { success: false, error };
    }
  }

  async ping(): Promise<RedisOperationResult<boolean>> {
    try {
      const reply = await this.getClient().ping();
      return { success: true, data: reply === 'PONG' };
    } catch (e) {
      const error: RedisError = { code: 'PING_FAILED', message: errorMessage(e) };
      return { success: false, error };
    }
  }
}

export const redisClient = RedisClient.getInstance();
