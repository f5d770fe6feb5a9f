/**
 * Folder routing: decides which archive folder a subject belongs in.
 */

import * as Rules from '@/rules';
import * as Resolver from './resolver';
import { ClassificationDecision, FolderCatalog, FolderOracle, ResolveOptions } from './types';

export type RoutingInstance = Resolver.ResolverInstance;

export const create = (rules: Rules.RuleCatalog): RoutingInstance => Resolver.create(rules);

/** One-shot resolution with the given rules, or the built-in ones. */
export const resolveFolder = (
    subject: string,
    catalog: FolderCatalog,
    oracle?: FolderOracle,
    options?: ResolveOptions & { rules?: Rules.RuleCatalog },
): Promise<ClassificationDecision> =>
    Resolver.create(options?.rules ?? Rules.getDefaultRules()).resolveFolder(subject, catalog, oracle, options);

export * from './types';
export { findInCatalog, leafName, normalizeFolderPath } from './paths';
