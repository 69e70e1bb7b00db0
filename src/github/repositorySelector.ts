import { MissingRepositorySelectionError } from "../errors/config.errors.js";
import type { Logger } from "../logging/logger.js";
import { noopLogger } from "../logging/logger.js";
import type { RepositoryRef } from "../types.js";
import type { RepositoryMetadataSource } from "./metadataClient.js";
import { parseRepositoryRef, repositoryKey } from "./repositoryRef.js";

export type RepositorySelection = {
  repositories: readonly string[];
  active: boolean;
};

export type ResolvedSelection = {
  explicit: RepositoryRef[];
  active: boolean;
};

/**
 * Validates the requested identifiers up front so a typo fails the run before any
 * repository is fetched. Bare names resolve against `login` when one is given.
 */
export function resolveSelection(selection: RepositorySelection, login?: string | null): ResolvedSelection {
  if (!selection.repositories.length && !selection.active) {
    throw new MissingRepositorySelectionError();
  }
  const seen = new Set<string>();
  const explicit: RepositoryRef[] = [];
  for (const value of selection.repositories) {
    const ref = parseRepositoryRef(value, login);
    const key = repositoryKey(ref).toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    explicit.push(ref);
  }
  return { explicit, active: selection.active };
}

export type SelectRepositoriesParams = {
  source: RepositoryMetadataSource;
  selection: ResolvedSelection;
  signal?: AbortSignal;
  logger?: Logger;
};

/**
 * Explicit repositories first, in the order given, then (with `active`) every
 * non-archived, non-fork repository owned by the authenticated user. Duplicates are
 * yielded once. The listing is paged lazily as the consumer pulls.
 */
export async function* selectRepositories(params: SelectRepositoriesParams): AsyncGenerator<RepositoryRef, void, undefined> {
  const logger = params.logger ?? noopLogger;
  const seen = new Set<string>();
  for (const ref of params.selection.explicit) {
    seen.add(repositoryKey(ref).toLowerCase());
    yield ref;
  }
  if (!params.selection.active) return;
  let listed = 0;
  for await (const ref of params.source.listRepositories({ activeOnly: true, signal: params.signal })) {
    const key = repositoryKey(ref).toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    listed += 1;
    yield ref;
  }
  logger.debug(`Selected ${listed} active repositories`);
}
