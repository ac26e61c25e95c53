import { Module } from '@nestjs/common';
import { ValueType } from '@opentelemetry/api';
import { MetricService } from 'nestjs-otel';
import { DEX_BROWSE_REQUESTS_TOTAL, DEX_TRANSFER_ITEM_PROCESSED_TOTAL } from './metrics.tokens';

@Module({
  providers: [
    {
      provide: DEX_TRANSFER_ITEM_PROCESSED_TOTAL,
      useFactory: (metricService: MetricService) => {
        return metricService.getCounter('dex_transfer_item_processed_total', {
          description: 'Number of transfer items by final status',
          valueType: ValueType.INT,
        });
      },
      inject: [MetricService],
    },
    {
      provide: DEX_BROWSE_REQUESTS_TOTAL,
      useFactory: (metricService: MetricService) => {
        return metricService.getCounter('dex_browse_requests_total', {
          description: 'Number of browse requests by hierarchy level and result',
          valueType: ValueType.INT,
        });
      },
      inject: [MetricService],
    },
  ],
  exports: [DEX_TRANSFER_ITEM_PROCESSED_TOTAL, DEX_BROWSE_REQUESTS_TOTAL],
})
export class MetricsModule {}
