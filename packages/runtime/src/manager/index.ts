// Entity manager, repositories and transactions

export { EntityManager, createEntityManager, type EntityManagerOptions } from './entity-manager.js';
export {
  createEntityRepository,
  parseEntityRecord,
  type EntityRepository,
  type EntityRepositoryOptions,
  type InstanceParser,
} from './entity-repository.js';
export { Transaction, type RepositorySource } from './transaction.js';
