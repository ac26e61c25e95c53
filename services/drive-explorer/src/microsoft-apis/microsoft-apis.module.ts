import { Module } from '@nestjs/common';
import { BottleneckFactory } from '../utils/bottleneck.factory';
import { GraphClientFactory } from './graph/graph-client.factory';

@Module({
  providers: [GraphClientFactory, BottleneckFactory],
  exports: [GraphClientFactory, BottleneckFactory],
})
export class MicrosoftApisModule {}
