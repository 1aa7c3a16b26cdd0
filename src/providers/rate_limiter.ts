/**
 * Sliding-window rate limiter for upstream APIs
 * Alpha Vantage free tier: 5 requests per minute
 */

import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('rate_limiter');

export interface RateLimiterConfig {
  maxRequestsPerWindow: number;
  windowMs: number;
  maxConcurrent: number;
}

export class RateLimiter {
  private requestTimes: number[] = [];
  private activeRequests = 0;
  private waitQueue: Array<() => void> = [];
  private readonly config: RateLimiterConfig;

  constructor(config: Partial<RateLimiterConfig> = {}) {
    this.config = {
      maxRequestsPerWindow: config.maxRequestsPerWindow ?? 5,
      windowMs: config.windowMs ?? 60_000,
      maxConcurrent: config.maxConcurrent ?? 1,
    };
  }

  private cleanOldRequests(): void {
    const windowStart = Date.now() - this.config.windowMs;
    this.requestTimes = this.requestTimes.filter((t) => t > windowStart);
  }

  private async waitForSlot(): Promise<void> {
    // Check concurrency
    while (this.activeRequests >= this.config.maxConcurrent) {
      await new Promise<void>((resolve) => {
        this.waitQueue.push(resolve);
      });
    }

    // Check rate limit
    this.cleanOldRequests();
    while (this.requestTimes.length >= this.config.maxRequestsPerWindow) {
      const oldestRequest = this.requestTimes[0];
      const waitTime = oldestRequest + this.config.windowMs - Date.now();
      if (waitTime > 0) {
        logger.debug({ waitTime }, 'Rate limit reached, waiting');
        await this.sleep(waitTime);
      }
      this.cleanOldRequests();
    }
  }

  async acquire(): Promise<void> {
    await this.waitForSlot();
    this.activeRequests++;
    this.requestTimes.push(Date.now());
  }

  release(): void {
    this.activeRequests = Math.max(0, this.activeRequests - 1);
    const next = this.waitQueue.shift();
    if (next) {
      next();
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  getStats(): { requestsInWindow: number; activeRequests: number } {
    this.cleanOldRequests();
    return {
      requestsInWindow: this.requestTimes.length,
      activeRequests: this.activeRequests,
    };
  }
}

// Singleton instance for the application
let globalRateLimiter: RateLimiter | null = null;

export function getRateLimiter(): RateLimiter {
  if (!globalRateLimiter) {
    globalRateLimiter = new RateLimiter();
  }
  return globalRateLimiter;
}

export function resetRateLimiter(): void {
  globalRateLimiter = null;
}
