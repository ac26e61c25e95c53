import type { CollectionConfig, ConnectionConfig, RegistryConfig } from './registry.schema';

export const CONNECTION_REGISTRY = Symbol('CONNECTION_REGISTRY');
export const COLLECTION_REGISTRY = Symbol('COLLECTION_REGISTRY');

export interface ConnectionRegistry {
  findConnection(connectionId: string): ConnectionConfig | undefined;
}

export interface CollectionRegistry {
  findCollection(collectionId: string): CollectionConfig | undefined;
}

/** Read-only lookup over the connections and collections of a loaded registry file. */
export class StaticRegistry implements ConnectionRegistry, CollectionRegistry {
  private readonly connections: Map<string, ConnectionConfig>;
  private readonly collections: Map<string, CollectionConfig>;

  public constructor(registry: RegistryConfig) {
    this.connections = new Map(registry.connections.map((c) => [c.id, c]));
    this.collections = new Map(registry.collections.map((c) => [c.id, c]));
  }

  public findConnection(connectionId: string): ConnectionConfig | undefined {
    return this.connections.get(connectionId);
  }

  public findCollection(collectionId: string): CollectionConfig | undefined {
    return this.collections.get(collectionId);
  }
}
