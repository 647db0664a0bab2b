/**
 * Predicate search over an element subtree.
 *
 * Pre-order walk (parent before children, children in provider order),
 * root included. Children are loaded right before they are walked. The
 * whole walk shares a single deadline; when it fires the walk stops and the
 * partial results are dropped. A child whose subtree fails to load or search
 * is logged and skipped so its siblings are still visited.
 */

import { errorMessage, TimeoutError } from '../errors';
import { throwIfAborted, withTimeout } from '../resilience/timeout';
import { validateElementRole, validateElementTitle } from '../validation';
import type { ElementNode } from './ElementNode';
import type { DescendantSearch, ElementQuery, SearchOptions, TreeContext } from './types';

interface NormalizedQuery {
  role?: string;
  title?: string;
}

/** Whether a single node satisfies every supplied predicate. */
export function matchesQuery<H>(node: ElementNode<H>, query: ElementQuery): boolean {
  if (query.role !== undefined) {
    const role = query.role.toLowerCase();
    if (node.role.toLowerCase() !== role && node.subRole.toLowerCase() !== role) {
      return false;
    }
  }

  if (query.title !== undefined) {
    const title = query.title.toLowerCase();
    const titleMatches = node.title.toLowerCase().includes(title);
    const descMatches =
      node.roleDescription !== '' && node.roleDescription.toLowerCase().includes(title);
    if (!titleMatches && !descMatches) return false;
  }

  return true;
}

export function describeQuery(query: ElementQuery): string {
  const parts: string[] = [];
  if (query.role !== undefined) parts.push(`role=${query.role}`);
  if (query.title !== undefined) parts.push(`title=${query.title}`);
  return parts.length > 0 ? parts.join(', ') : 'all';
}

export class SearchEngine<H> implements DescendantSearch<H> {
  constructor(private readonly ctx: TreeContext<H>) {}

  async findDescendants(
    root: ElementNode<H>,
    query: ElementQuery = {},
    options: SearchOptions = {},
  ): Promise<ElementNode<H>[]> {
    const normalized = this.normalize(query);
    const timeoutMs = this.ctx.config.search.timeoutMs;
    const label = `findDescendants(${describeQuery(normalized)})`;

    try {
      return await withTimeout(
        timeoutMs,
        async (signal) => {
          const results: ElementNode<H>[] = [];
          await this.walk(root, normalized, results, [signal, options.signal], options.limit);
          return results;
        },
        label,
      );
    } catch (err) {
      if (err instanceof TimeoutError && err.operation === label) {
        this.ctx.logger.warn('search_timed_out', { root: root.description, query: label, timeoutMs });
        this.ctx.events.emit('operationTimedOut', { operation: label, durationMs: timeoutMs });
      }
      throw err;
    }
  }

  private normalize(query: ElementQuery): NormalizedQuery {
    const normalized: NormalizedQuery = {};
    if (query.role !== undefined) normalized.role = validateElementRole(query.role, this.ctx.logger);
    if (query.title !== undefined) normalized.title = validateElementTitle(query.title);
    return normalized;
  }

  /** Returns true once `limit` matches have been collected. */
  private async walk(
    node: ElementNode<H>,
    query: NormalizedQuery,
    results: ElementNode<H>[],
    signals: (AbortSignal | undefined)[],
    limit: number | undefined,
  ): Promise<boolean> {
    for (const signal of signals) throwIfAborted(signal);

    if (matchesQuery(node, query)) {
      results.push(node);
      if (limit !== undefined && results.length >= limit) return true;
    }

    if (node.hasChildren) {
      try {
        await node.loadChildrenIfNeeded();
      } catch (err) {
        for (const signal of signals) throwIfAborted(signal);
        this.ctx.logger.warn('child_load_failed', { element: node.description, error: errorMessage(err) });
        return false;
      }
    }

    for (const child of node.children) {
      try {
        if (await this.walk(child, query, results, signals, limit)) return true;
      } catch (err) {
        for (const signal of signals) throwIfAborted(signal);
        this.ctx.logger.warn('child_search_failed', { element: child.description, error: errorMessage(err) });
      }
    }

    return false;
  }
}
