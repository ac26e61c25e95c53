import { Module } from '@nestjs/common';
import { SiteAggregator } from './site-aggregator.service';
import { TreeBrowser } from './tree-browser.service';

@Module({
  providers: [SiteAggregator, TreeBrowser],
  exports: [TreeBrowser],
})
export class BrowserModule {}
