import { errorMessage } from '../errors';
import { Attribute } from '../provider/attributes';
import { withTimeout } from '../resilience/timeout';
import { ElementNode } from './ElementNode';
import type { TreeContext } from './types';

/**
 * Build a node from a provider handle.
 *
 * Role, title, role description, subrole, child flag and owning pid are
 * read concurrently, each under the attribute timeout. A read that fails
 * falls back to an empty value (role: "unknown") so one stubborn attribute
 * never prevents the element from appearing in the tree.
 */
export async function buildElement<H>(ctx: TreeContext<H>, handle: H): Promise<ElementNode<H>> {
  const { provider } = ctx;
  const timeoutMs = ctx.config.attribute.timeoutMs;

  const read = async <T>(name: string, fallback: T, fetch: () => Promise<T | undefined>): Promise<T> => {
    try {
      const value = await withTimeout(timeoutMs, () => fetch(), `read ${name}`);
      return value ?? fallback;
    } catch (err) {
      ctx.logger.debug('attribute_read_failed', { attribute: name, error: errorMessage(err) });
      return fallback;
    }
  };

  const readString = (key: string) =>
    read(key, '', async () => {
      const value = await provider.attributeValue(handle, key);
      return typeof value === 'string' ? value : undefined;
    });

  const [role, title, roleDescription, subRole, hasChildren, ownerProcessID] = await Promise.all([
    read('role', 'unknown', () => provider.roleOf(handle)),
    read('title', '', () => provider.titleOf(handle)),
    readString(Attribute.roleDescription),
    readString(Attribute.subRole),
    read('hasChildren', false, () => provider.hasChildren(handle)),
    read('processId', 0, async () => provider.processIdOf?.(handle)),
  ]);

  return new ElementNode<H>(
    { role, title, roleDescription, subRole, hasChildren, ownerProcessID, handle },
    ctx,
  );
}
