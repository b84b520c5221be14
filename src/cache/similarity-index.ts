/**
 * Similarity Index
 *
 * Symmetric adjacency graph between cached content hashes whose perceptual
 * hashes are within the similarity threshold. Comparisons on insert are
 * bounded to the most recently registered nodes; results are memoized as
 * edges so later lookups are a single map read.
 *
 * Invariant: every edge is stored on both endpoints, and removing a node
 * removes it from every neighbour's list.
 */

import { EventEmitter } from 'events';
import { similarity } from './image-hasher.js';
import type { ContentHash, PerceptualHash } from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface SimilarityIndexConfig {
  /** Minimum similarity (1 - Hamming distance) for an edge */
  threshold: number;
  /** Bound on the nodes compared per insert */
  maxCandidates: number;
}

export interface SimilarityEdge {
  a: ContentHash;
  b: ContentHash;
  similarity: number;
}

export interface SimilarMatch {
  hash: ContentHash;
  similarity: number;
}

export interface RebuildResult {
  nodes: number;
  edges: number;
  aborted: boolean;
}

const DEFAULT_INDEX_CONFIG: SimilarityIndexConfig = {
  threshold: 0.8,
  maxCandidates: 200,
};

/** Nodes processed between event-loop yields during a rebuild */
const REBUILD_BATCH = 50;

// ============================================================================
// Similarity Index
// ============================================================================

export class SimilarityIndex extends EventEmitter {
  private config: SimilarityIndexConfig;

  /** Registered nodes; Map order is registration recency (oldest first) */
  private nodes: Map<ContentHash, PerceptualHash> = new Map();
  private adjacency: Map<ContentHash, Map<ContentHash, number>> = new Map();

  constructor(config: Partial<SimilarityIndexConfig> = {}) {
    super();
    this.config = { ...DEFAULT_INDEX_CONFIG, ...config };
  }

  get threshold(): number {
    return this.config.threshold;
  }

  /**
   * Register a hash and link it to every candidate within the threshold.
   * Without explicit candidates, the most recently registered nodes are used.
   */
  insert(
    hash: ContentHash,
    perceptualHash: PerceptualHash,
    candidates?: Iterable<ContentHash>
  ): SimilarityEdge[] {
    // Re-registering moves the node to the recent end
    this.nodes.delete(hash);

    const pool = candidates ? Array.from(candidates) : this.recentNodes(this.config.maxCandidates);
    this.nodes.set(hash, perceptualHash);

    const edges: SimilarityEdge[] = [];
    let compared = 0;

    for (const candidate of pool) {
      if (compared >= this.config.maxCandidates) break;
      if (candidate === hash) continue;

      const candidateHash = this.nodes.get(candidate);
      if (candidateHash === undefined) continue;
      compared++;

      const score = similarity(perceptualHash, candidateHash);
      if (score >= this.config.threshold) {
        this.addEdge(hash, candidate, score);
        edges.push({ a: hash, b: candidate, similarity: score });
      }
    }

    if (edges.length > 0) {
      this.emit('link', edges);
    }
    return edges;
  }

  /**
   * Record one edge between two registered nodes
   */
  link(a: ContentHash, b: ContentHash, score: number): boolean {
    if (a === b || !this.nodes.has(a) || !this.nodes.has(b)) {
      return false;
    }
    this.addEdge(a, b, score);
    this.emit('link', [{ a, b, similarity: score }]);
    return true;
  }

  /**
   * Neighbours of a hash, most similar first
   */
  neighbors(hash: ContentHash): ContentHash[] {
    return this.neighborMatches(hash).map((match) => match.hash);
  }

  neighborMatches(hash: ContentHash): SimilarMatch[] {
    const edges = this.adjacency.get(hash);
    if (!edges) return [];

    return Array.from(edges, ([neighbor, score]) => ({ hash: neighbor, similarity: score }))
      .sort((x, y) => y.similarity - x.similarity);
  }

  /**
   * Scan registered nodes for hashes similar to a perceptual hash that is not
   * (yet) in the index. Bounded to the most recent `scanLimit` nodes.
   */
  findSimilar(
    perceptualHash: PerceptualHash,
    options: { threshold?: number; limit?: number; scanLimit?: number; exclude?: ContentHash } = {}
  ): SimilarMatch[] {
    const threshold = options.threshold ?? this.config.threshold;
    const scanLimit = options.scanLimit ?? this.config.maxCandidates;
    const matches: SimilarMatch[] = [];

    for (const hash of this.recentNodes(scanLimit)) {
      if (hash === options.exclude) continue;
      const candidateHash = this.nodes.get(hash);
      if (candidateHash === undefined) continue;

      const score = similarity(perceptualHash, candidateHash);
      if (score >= threshold) {
        matches.push({ hash, similarity: score });
      }
    }

    matches.sort((x, y) => y.similarity - x.similarity);
    return options.limit !== undefined ? matches.slice(0, options.limit) : matches;
  }

  /**
   * Remove a node and every edge that references it. Idempotent.
   */
  remove(hash: ContentHash): boolean {
    const existed = this.nodes.delete(hash);
    const edges = this.adjacency.get(hash);

    if (edges) {
      for (const neighbor of edges.keys()) {
        this.detach(neighbor, hash);
      }
      this.adjacency.delete(hash);
    }

    if (existed) {
      this.emit('remove', hash);
    }
    return existed;
  }

  has(hash: ContentHash): boolean {
    return this.nodes.has(hash);
  }

  hashes(): ContentHash[] {
    return Array.from(this.nodes.keys());
  }

  /**
   * Recompute the edges of every node against its registration-order
   * neighbourhood. Each node's edge set is replaced in one synchronous step,
   * so aborting between steps leaves the graph consistent.
   */
  async rebuild(signal?: AbortSignal): Promise<RebuildResult> {
    const order = Array.from(this.nodes.keys());
    const window = this.config.maxCandidates;

    for (let i = 0; i < order.length; i++) {
      if (signal?.aborted) {
        return { ...this.stats(), aborted: true };
      }

      const hash = order[i];
      const perceptualHash = this.nodes.get(hash);
      if (perceptualHash !== undefined) {
        const from = Math.max(0, i - window);
        const to = Math.min(order.length, i + window + 1);
        const fresh = new Map<ContentHash, number>();

        for (let j = from; j < to; j++) {
          if (j === i) continue;
          const other = order[j];
          const otherHash = this.nodes.get(other);
          if (otherHash === undefined) continue;

          const score = similarity(perceptualHash, otherHash);
          if (score >= this.config.threshold) {
            fresh.set(other, score);
          }
        }

        this.replaceEdges(hash, fresh);
      }

      if ((i + 1) % REBUILD_BATCH === 0) {
        await new Promise<void>((resolve) => setImmediate(resolve));
      }
    }

    const result = { ...this.stats(), aborted: false };
    this.emit('rebuild', result);
    return result;
  }

  stats(): { nodes: number; edges: number } {
    let endpoints = 0;
    for (const edges of this.adjacency.values()) {
      endpoints += edges.size;
    }
    return { nodes: this.nodes.size, edges: endpoints / 2 };
  }

  clear(): void {
    this.nodes.clear();
    this.adjacency.clear();
    this.emit('clear');
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private recentNodes(limit: number): ContentHash[] {
    const all = Array.from(this.nodes.keys());
    return all.slice(Math.max(0, all.length - limit)).reverse();
  }

  private addEdge(a: ContentHash, b: ContentHash, score: number): void {
    this.attach(a, b, score);
    this.attach(b, a, score);
  }

  private attach(from: ContentHash, to: ContentHash, score: number): void {
    let edges = this.adjacency.get(from);
    if (!edges) {
      edges = new Map();
      this.adjacency.set(from, edges);
    }
    edges.set(to, score);
  }

  private detach(from: ContentHash, to: ContentHash): void {
    const edges = this.adjacency.get(from);
    if (!edges) return;

    edges.delete(to);
    if (edges.size === 0) {
      this.adjacency.delete(from);
    }
  }

  private replaceEdges(hash: ContentHash, fresh: Map<ContentHash, number>): void {
    const current = this.adjacency.get(hash);
    if (current) {
      for (const neighbor of current.keys()) {
        if (!fresh.has(neighbor)) {
          this.detach(neighbor, hash);
        }
      }
      this.adjacency.delete(hash);
    }

    for (const [neighbor, score] of fresh) {
      this.addEdge(hash, neighbor, score);
    }
  }
}
