// Entity registry exports

export { EntityRegistry, createEntityRegistry, type EntityRegistryOptions } from './registry.js';
