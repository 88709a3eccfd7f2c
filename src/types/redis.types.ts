/**
 * Redis operation result
 */
export interface RedisOperationResult<T = void> {
  success: boolean;
  data?: T;
  error?: RedisError;
}

/**
 * Redis error type
 */
export interface RedisError {
  code: string;
  message: string;
  details?: unknown;
}
