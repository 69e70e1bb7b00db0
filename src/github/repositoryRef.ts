import { InvalidRepositoryRefError } from "../errors/config.errors.js";
import type { RepositoryRef } from "../types.js";

const SEGMENT = /^[A-Za-z0-9_.-]+$/;

export function repositoryKey(ref: RepositoryRef): string {
  return `${ref.owner}/${ref.name}`;
}

export function createRepositoryRef(owner: string, name: string): RepositoryRef {
  return Object.freeze({ owner, name });
}

/**
 * Parses `owner/name`, a bare `name` (resolved against `defaultOwner`) or a
 * `https://github.com/owner/name` URL.
 */
export function parseRepositoryRef(value: string, defaultOwner?: string | null): RepositoryRef {
  const trimmed = value
    .trim()
    .replace(/^https?:\/\/github\.com\//i, "")
    .replace(/\.git$/i, "")
    .replace(/\/+$/, "");
  const parts = trimmed.split("/");
  if (parts.length === 1 && defaultOwner && SEGMENT.test(parts[0])) {
    return createRepositoryRef(defaultOwner, parts[0]);
  }
  if (parts.length === 2 && SEGMENT.test(parts[0]) && SEGMENT.test(parts[1])) {
    return createRepositoryRef(parts[0], parts[1]);
  }
  throw new InvalidRepositoryRefError(value);
}

export function repositoryApiPath(ref: RepositoryRef, suffix = ""): string {
  return `/repos/${encodeURIComponent(ref.owner)}/${encodeURIComponent(ref.name)}${suffix}`;
}

export function encodePath(filePath: string): string {
  return filePath.split("/").map(encodeURIComponent).join("/");
}
