// Typed schema definitions

export {
  defineEntity,
  defineEmbeddable,
  bytes,
  toSnakeCase,
  isTypeDefinition,
  type TypeDefinition,
  type EntityType,
  type EmbeddableType,
  type EntityConfig,
  type EmbeddableConfig,
  type ShapeOutput,
  type IdentityOf,
  type Infer,
} from './define.js';
