import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Bottleneck from 'bottleneck';
import type { Config } from '../config';

export interface BottleneckConfig {
  reservoir: number;
  reservoirRefreshAmount: number;
  reservoirRefreshInterval: number;
  maxConcurrent?: number;
  minTime?: number;
}

@Injectable()
export class BottleneckFactory {
  private readonly logger = new Logger(this.constructor.name);
  private readonly isDebugEnabled: boolean;

  public constructor(configService: ConfigService<Config, true>) {
    this.isDebugEnabled = configService.get('app.logLevel', { infer: true }) === 'debug';
  }

  /** A limiter granting `perMinute` requests, refilled every minute. */
  public createPerMinuteLimiter(perMinute: number, contextName: string): Bottleneck {
    return this.createLimiter(
      {
        reservoir: perMinute,
        reservoirRefreshAmount: perMinute,
        reservoirRefreshInterval: 60_000,
      },
      contextName,
    );
  }

  public createLimiter(config: BottleneckConfig, contextName: string): Bottleneck {
    const limiter = new Bottleneck(config);

    limiter.on('depleted', (empty) => {
      if (empty) {
        this.logger.log(`${contextName}: Rate limit reservoir depleted - queuing requests`);
      }
    });

    if (this.isDebugEnabled) {
      limiter.on('queued', () => {
        const queueCount = limiter.counts().QUEUED;
        if (queueCount > 1) {
          this.logger.debug(`${contextName}: Rate limit queue size reached ${queueCount} requests`);
        }
      });
    }

    limiter.on('dropped', () => {
      this.logger.error(`${contextName}: Rate limit request dropped due to queue overflow`);
    });

    limiter.on('error', (error) => {
      this.logger.error(`${contextName}: Rate limit bottleneck error: ${error.message}`, error);
    });

    return limiter;
  }
}
