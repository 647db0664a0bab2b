/**
 * Resolves an element's children on first access.
 *
 * Different element kinds expose their children through different provider
 * surfaces, so strategies are tried in priority order:
 *   childrenAccessor > childrenAttribute > rawHandle
 * and the first one that returns a non-empty list wins. Each attempt runs
 * under the loader's strategy timeout; a failing strategy is logged and the
 * next one is tried.
 *
 * Loads are memoized on the node (loaded-once) and concurrent callers share
 * the same in-flight load.
 */

import { errorMessage } from '../errors';
import { Attribute } from '../provider/attributes';
import type { AccessibilityProvider } from '../provider/types';
import { withTimeout } from '../resilience/timeout';
import type { ElementNode } from './ElementNode';
import type { ChildLoading, TreeContext } from './types';

type Strategy = {
  name: string;
  fetch: <H>(provider: AccessibilityProvider<H>, handle: H) => Promise<H[] | null>;
};

const STRATEGIES: Strategy[] = [
  {
    name: 'childrenAccessor',
    fetch: (provider, handle) => provider.childrenOf(handle),
  },
  {
    name: 'childrenAttribute',
    fetch: async <H>(provider: AccessibilityProvider<H>, handle: H): Promise<H[] | null> => {
      const value: unknown = await provider.attributeValue(handle, Attribute.children);
      if (!Array.isArray(value)) return null;
      const handles: H[] = [];
      for (const item of value) {
        if (provider.isElementHandle(item)) handles.push(item);
      }
      return handles;
    },
  },
  {
    name: 'rawHandle',
    fetch: async (provider, handle) => (provider.rawChildrenOf ? provider.rawChildrenOf(handle) : null),
  },
];

export class ChildLoader<H> implements ChildLoading<H> {
  private inFlight = new WeakMap<ElementNode<H>, Promise<boolean>>();

  constructor(private readonly ctx: TreeContext<H>) {}

  /**
   * Returns true when children are (or already were) loaded, false when the
   * node has none or none could be reached.
   */
  loadChildrenIfNeeded(node: ElementNode<H>): Promise<boolean> {
    if (node.children.length > 0) return Promise.resolve(true);
    if (!node.hasChildren) return Promise.resolve(false);
    if (node.handle === undefined) return Promise.resolve(false);

    const pending = this.inFlight.get(node);
    if (pending) return pending;

    const load = this.load(node, node.handle).finally(() => {
      this.inFlight.delete(node);
    });
    this.inFlight.set(node, load);
    return load;
  }

  private async load(node: ElementNode<H>, handle: H): Promise<boolean> {
    const { logger, provider, events } = this.ctx;
    const timeoutMs = this.ctx.config.loader.strategyTimeoutMs;

    logger.debug('loading_children', { element: node.description });

    for (const strategy of STRATEGIES) {
      let handles: H[] | null;
      try {
        handles = await withTimeout(
          timeoutMs,
          () => strategy.fetch(provider, handle),
          `${strategy.name}(${node.description})`,
        );
      } catch (err) {
        logger.warn('child_strategy_failed', {
          element: node.description,
          strategy: strategy.name,
          error: errorMessage(err),
        });
        continue;
      }

      if (!handles || handles.length === 0) continue;

      const children: ElementNode<H>[] = [];
      for (const childHandle of handles) {
        children.push(await this.ctx.elementFromHandle(childHandle));
      }

      // Another path may have populated the node while we were building.
      if (!node.attachLoadedChildren(children)) return node.children.length > 0;

      logger.debug('children_loaded', {
        element: node.description,
        strategy: strategy.name,
        count: children.length,
      });
      events.emit('childrenLoaded', { element: node, strategy: strategy.name, count: children.length });
      return true;
    }

    node.markChildrenInaccessible();
    logger.warn('children_inaccessible', {
      element: node.description,
      message: 'Expected children but none were accessible',
    });
    events.emit('childrenInaccessible', { element: node });
    return false;
  }
}
