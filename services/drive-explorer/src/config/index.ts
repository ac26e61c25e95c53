import type { AppConfigNamespaced } from './app.config';
import type { BrowseConfigNamespaced } from './browse.config';
import type { GraphConfigNamespaced } from './graph.config';
import type { TransferConfigNamespaced } from './transfer.config';

export { type AppConfig, appConfig } from './app.config';
export { type BrowseConfig, browseConfig } from './browse.config';
export { type GraphConfig, graphConfig } from './graph.config';
export { type TransferConfig, transferConfig } from './transfer.config';

export type Config = AppConfigNamespaced &
  GraphConfigNamespaced &
  BrowseConfigNamespaced &
  TransferConfigNamespaced;
