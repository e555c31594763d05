/**
 * RepositoryInspector - read-only queries that drive override preconditions
 *
 * @module repository_inspector
 */

export { RepositoryInspector } from './repository_inspector';
export type {
  IRepositoryInspector,
  RepositoryInspectorDependencies,
  RepositoryState,
  WorkingTreeStatus,
} from './repository_inspector.types';
