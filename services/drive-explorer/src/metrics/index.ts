export * from './metrics.tokens';
