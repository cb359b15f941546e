// @docmap/runtime
// Maps registered entity types onto addressable documents

// Entity manager (the entry point - registry + document → repositories)
export {
  EntityManager,
  createEntityManager,
  Transaction,
  createEntityRepository,
  parseEntityRecord,
  type EntityManagerOptions,
  type EntityRepository,
  type EntityRepositoryOptions,
  type InstanceParser,
  type RepositorySource,
} from './manager/index.js';

// Registry
export { EntityRegistry, createEntityRegistry, type EntityRegistryOptions } from './registry/index.js';

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
} from './schema/index.js';

// Hydration, reconciliation and paths
export {
  hydrate,
  reconcile,
  collectionPath,
  entityPath,
  encodeIdentity,
  decodeIdentity,
  sameIdentityKey,
  encodeScalar,
  decodeScalar,
  describeValue,
} from './mapping/index.js';

// Error types
export {
  MappingError,
  isMappingError,
  UnregisteredTypeError,
  ConflictingSchemaError,
  InvalidIdentityError,
  NodeNotFoundError,
  ShapeMismatchError,
  MissingFieldError,
  TypeMismatchError,
  InvalidDescriptorError,
  EntityAlreadyExistsError,
  KeyMismatchError,
  TransactionAbortedError,
  RegistrySealedError,
  ConfigError,
  type MappingErrorCode,
} from './errors.js';

// Logging
export {
  consoleLogger,
  silentLogger,
  createCapturingLogger,
  createLevelLogger,
  type Logger,
  type LogLevel,
  type LogEntry,
} from './logger.js';

// Configuration
export {
  loadConfig,
  createLoggerFromConfig,
  createYjsDocumentFromConfig,
  type DocmapConfig,
} from './config.js';
