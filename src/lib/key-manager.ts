/**
 * API Key Manager - rotates Companies House API keys so that no single key
 * exceeds the per-key rate limit.
 */
import { logProcess } from './logger';

// Companies House API rate limits are 600 requests per 5 minutes per key
export const RATE_LIMIT_PER_KEY = 600;
export const RATE_LIMIT_WINDOW_MS = 5 * 60 * 1000;

export interface KeyStats {
  maskedKey: string;
  requestCount: number;
  windowStartTime: number;
  usagePercent: number;
}

export interface KeyManagerOptions {
  now?: () => number;
  debug?: boolean;
}

export function maskKey(key: string): string {
  return `${key.substring(0, 8)}...`;
}

export class ApiKeyManager {
  private readonly keys: string[];
  private readonly usage = new Map<string, { count: number; windowStart: number }>();
  private readonly now: () => number;
  private readonly debug: boolean;

  constructor(apiKeys: string[], options: KeyManagerOptions = {}) {
    this.now = options.now ?? Date.now;
    this.debug = options.debug ?? false;

    this.keys = apiKeys.map(key => key.trim()).filter(key => key.length > 0);
    if (this.keys.length === 0) {
      throw new Error('At least one API key must be provided');
    }

    const start = this.now();
    for (const key of this.keys) {
      this.usage.set(key, { count: 0, windowStart: start });
    }

    this.log(`Initialized with ${this.keys.length} API keys`);
  }

  /**
   * The key with the most remaining capacity in its current window.
   */
  getNextKey(): string {
    this.resetExpiredWindows();

    let selected = this.keys[0];
    for (const key of this.keys) {
      if (this.getKeyUsagePercent(key) < this.getKeyUsagePercent(selected)) {
        selected = key;
      }
    }

    this.log(`Selected key: ${maskKey(selected)} (${this.getKeyUsagePercent(selected).toFixed(1)}% used)`);
    return selected;
  }

  /**
   * Record a request made with `key`, successful or not.
   */
  registerRequest(key: string): void {
    const usage = this.usage.get(key);
    if (!usage) {
      throw new Error(`Unknown API key: ${maskKey(key)}`);
    }

    if (this.now() - usage.windowStart > RATE_LIMIT_WINDOW_MS) {
      usage.count = 0;
      usage.windowStart = this.now();
    }
    usage.count += 1;

    if (usage.count % 100 === 0) {
      this.log(`Key ${maskKey(key)} has made ${usage.count} requests (${this.getKeyUsagePercent(key).toFixed(1)}%)`);
    }
  }

  getStats(): KeyStats[] {
    this.resetExpiredWindows();

    return this.keys.map(key => {
      const usage = this.usageOf(key);
      return {
        maskedKey: maskKey(key),
        requestCount: usage.count,
        windowStartTime: usage.windowStart,
        usagePercent: this.getKeyUsagePercent(key),
      };
    });
  }

  /**
   * True when every key has used more than 90% of its window.
   */
  areAllKeysExhausted(): boolean {
    this.resetExpiredWindows();
    return this.keys.every(key => this.getKeyUsagePercent(key) > 90);
  }

  /**
   * Milliseconds until the earliest key window resets.
   */
  getWaitTimeMs(): number {
    this.resetExpiredWindows();

    const earliestReset = Math.min(
      ...this.keys.map(key => this.usageOf(key).windowStart + RATE_LIMIT_WINDOW_MS)
    );
    return Math.max(0, earliestReset - this.now());
  }

  private resetExpiredWindows(): void {
    const now = this.now();
    for (const key of this.keys) {
      if (now - this.usageOf(key).windowStart > RATE_LIMIT_WINDOW_MS) {
        this.usage.set(key, { count: 0, windowStart: now });
      }
    }
  }

  private usageOf(key: string): { count: number; windowStart: number } {
    const usage = this.usage.get(key);
    if (!usage) {
      throw new Error(`Unknown API key: ${maskKey(key)}`);
    }
    return usage;
  }

  private getKeyUsagePercent(key: string): number {
    return (this.usageOf(key).count / RATE_LIMIT_PER_KEY) * 100;
  }

  private log(message: string): void {
    if (this.debug) {
      logProcess(`[KEY MANAGER] ${message}`);
    }
  }
}
