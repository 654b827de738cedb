/**
 * TransformCache - expansion results keyed by content hash
 *
 * A derived plan depends on the types a file imports, so an entry is only
 * reused while the file and every file it imports hash the same as when the
 * entry was stored.
 */

import type { TransformResult } from "./pipeline.js";
import xxhashInit, { type XXHashAPI } from "xxhash-wasm";

/** xxhash API - initialized lazily */
let xxhashApi: XXHashAPI | null = null;
let xxhashInitPromise: Promise<XXHashAPI> | null = null;

/**
 * Initialize xxhash for fast content hashing.
 * Call this early in build startup; hashContent() falls back until it resolves.
 */
export async function initHasher(): Promise<void> {
  if (xxhashApi) return;
  if (!xxhashInitPromise) {
    xxhashInitPromise = xxhashInit();
  }
  xxhashApi = await xxhashInitPromise;
}

/**
 * Content hash for cache invalidation.
 * Uses xxhash64 if initialized, falls back to DJB2 otherwise.
 */
export function hashContent(content: string): string {
  if (xxhashApi) {
    return xxhashApi.h64ToString(content);
  }

  let hash = 0;
  for (let i = 0; i < content.length; i++) {
    hash = (hash << 5) - hash + content.charCodeAt(i);
    hash = hash & hash;
  }
  return hash.toString(36);
}

/**
 * Transform cache entry with dependency tracking
 */
export interface TransformCacheEntry {
  result: TransformResult;
  contentHash: string;
  dependencyHashes: Map<string, string>;
}

/**
 * Dependency graph for tracking file relationships
 */
export class DependencyGraph {
  /** Map from file to the files it imports */
  private dependencies = new Map<string, Set<string>>();
  /** Map from file to the files that import it */
  private dependents = new Map<string, Set<string>>();

  setDependencies(fileName: string, deps: Set<string>): void {
    this.remove(fileName);
    this.dependencies.set(fileName, deps);
    for (const dep of deps) {
      let depSet = this.dependents.get(dep);
      if (!depSet) {
        depSet = new Set();
        this.dependents.set(dep, depSet);
      }
      depSet.add(fileName);
    }
  }

  /**
   * Files that directly or indirectly import the given file
   */
  getTransitiveDependents(fileName: string): Set<string> {
    const visited = new Set<string>();
    const stack = [fileName];

    for (let current = stack.pop(); current !== undefined; current = stack.pop()) {
      for (const dep of this.dependents.get(current) ?? []) {
        if (!visited.has(dep)) {
          visited.add(dep);
          stack.push(dep);
        }
      }
    }

    return visited;
  }

  remove(fileName: string): void {
    for (const dep of this.dependencies.get(fileName) ?? []) {
      this.dependents.get(dep)?.delete(fileName);
    }
    this.dependencies.delete(fileName);
  }

  clear(): void {
    this.dependencies.clear();
    this.dependents.clear();
  }
}

/**
 * LRU cache of transform results
 */
export class TransformCache {
  private entries = new Map<string, TransformCacheEntry>();
  private depGraph = new DependencyGraph();
  private maxSize: number;

  constructor(options: { maxSize?: number } = {}) {
    this.maxSize = options.maxSize ?? 1000;
  }

  /**
   * Look up an entry that is still valid for the given content hash
   */
  get(
    fileName: string,
    contentHash: string,
    getContentHash: (dep: string) => string | undefined,
  ): TransformResult | undefined {
    const entry = this.entries.get(fileName);
    if (!entry || entry.contentHash !== contentHash) return undefined;

    for (const [dep, hash] of entry.dependencyHashes) {
      if (getContentHash(dep) !== hash) return undefined;
    }

    // Re-insert to mark as most recently used
    this.entries.delete(fileName);
    this.entries.set(fileName, entry);
    return entry.result;
  }

  set(fileName: string, entry: TransformCacheEntry): void {
    this.entries.delete(fileName);
    this.entries.set(fileName, entry);
    this.depGraph.setDependencies(fileName, new Set(entry.dependencyHashes.keys()));

    while (this.entries.size > this.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.depGraph.remove(oldest.value);
    }
  }

  /**
   * Drop a file and everything that imports it; returns the dropped dependents
   */
  invalidate(fileName: string): Set<string> {
    const dependents = this.depGraph.getTransitiveDependents(fileName);
    this.entries.delete(fileName);
    for (const dep of dependents) {
      this.entries.delete(dep);
    }
    return dependents;
  }

  clear(): void {
    this.entries.clear();
    this.depGraph.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
