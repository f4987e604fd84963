/**
 * Barrel exports for the repository module.
 */

export type { RepositoryResolver } from './repository-resolver.js'
export {
  GitRepositoryResolver,
  createRepositoryResolver,
} from './git-repository-resolver.js'
export type { GitRepositoryResolverOptions } from './git-repository-resolver.js'
export { StaticRepositoryResolver } from './static-repository-resolver.js'
