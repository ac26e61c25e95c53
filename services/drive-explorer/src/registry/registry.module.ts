import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Config } from '../config';
import { loadRegistry } from './registry-loader';
import { COLLECTION_REGISTRY, CONNECTION_REGISTRY, StaticRegistry } from './registry.service';

@Module({
  providers: [
    {
      provide: StaticRegistry,
      useFactory: (configService: ConfigService<Config, true>) => {
        const registryFile = configService.get('app.registryFile', { infer: true });
        const registry = loadRegistry(registryFile);
        new Logger('RegistryModule').log(
          `Loaded ${registry.connections.length} connections and ` +
            `${registry.collections.length} collections`,
        );
        return new StaticRegistry(registry);
      },
      inject: [ConfigService],
    },
    { provide: CONNECTION_REGISTRY, useExisting: StaticRegistry },
    { provide: COLLECTION_REGISTRY, useExisting: StaticRegistry },
  ],
  exports: [CONNECTION_REGISTRY, COLLECTION_REGISTRY],
})
export class RegistryModule {}
