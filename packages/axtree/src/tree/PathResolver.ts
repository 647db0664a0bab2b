/**
 * Addresses an element by `role[title]/role[title]/...`.
 *
 * Each segment is resolved by searching the current element's subtree
 * (current element included) and taking the first pre-order match. The
 * whole walk runs under one deadline; every step's search honours it.
 */

import { ElementNotFoundError, TimeoutError, ValidationError } from '../errors';
import { withTimeout } from '../resilience/timeout';
import { validatePathExpression } from '../validation';
import type { ElementNode } from './ElementNode';
import type { PathSegment, TreeContext } from './types';

// --- Parsing ---

export function parsePath(path: string): PathSegment[] {
  const expression = validatePathExpression(path);
  const components = expression.split('/').filter((component) => component.length > 0);

  if (components.length === 0) {
    throw new ValidationError('path', 'Path contains no components');
  }

  return components.map(parseComponent);
}

function parseComponent(component: string): PathSegment {
  const open = component.indexOf('[');
  const invalid = () => new ValidationError('path', `Invalid path format at component: ${component}`);

  if (open <= 0 || !component.endsWith(']')) throw invalid();
  if (component.indexOf('[', open + 1) !== -1) throw invalid();

  const role = component.slice(0, open).trim();
  if (role.length === 0) throw invalid();

  return { role, title: component.slice(open + 1, -1) };
}

export function formatPath(segments: readonly PathSegment[]): string {
  return segments.map((segment) => `${segment.role}[${segment.title}]`).join('/');
}

// --- Resolution ---

export class PathResolver<H> {
  constructor(private readonly ctx: TreeContext<H>) {}

  async findElementByPath(path: string, root: ElementNode<H>): Promise<ElementNode<H>> {
    const segments = parsePath(path);
    const timeoutMs = this.ctx.config.path.timeoutMs;
    const label = `findElementByPath(${path})`;

    try {
      return await withTimeout(
        timeoutMs,
        async (signal) => {
          let current = root;
          const resolved: PathSegment[] = [];

          for (const segment of segments) {
            const title = segment.title.trim().length > 0 ? segment.title : undefined;
            const [match] = await this.ctx.search.findDescendants(
              current,
              { role: segment.role, title },
              { limit: 1, signal },
            );

            if (!match) {
              const resolvedPath = resolved.length > 0 ? formatPath(resolved) : '<root>';
              throw new ElementNotFoundError(
                `${segment.role} with title '${segment.title}' (resolved: ${resolvedPath})`,
                { path, resolvedPath },
              );
            }

            resolved.push(segment);
            current = match;
          }

          this.ctx.logger.debug('path_resolved', { path, element: current.description });
          return current;
        },
        label,
      );
    } catch (err) {
      if (err instanceof TimeoutError && err.operation === label) {
        this.ctx.logger.warn('path_timed_out', { path, root: root.description, timeoutMs });
        this.ctx.events.emit('operationTimedOut', { operation: label, durationMs: timeoutMs });
      }
      throw err;
    }
  }
}
