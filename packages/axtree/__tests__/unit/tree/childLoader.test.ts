import { describe, expect, test, vi } from 'vitest';
import { createMockTree } from '../../fixtures/mockTree';
import type { MockElementSpec } from '../../../src/provider/mock';

function windowWith(children: MockElementSpec[], extra: Partial<MockElementSpec> = {}): MockElementSpec {
  return { role: 'window', title: 'Main Window', children, ...extra };
}

const BUTTONS: MockElementSpec[] = [
  { role: 'button', title: 'OK' },
  { role: 'button', title: 'Cancel' },
];

describe('ChildLoader', () => {
  test('returns false and loads nothing when the element reports no children', async () => {
    const { root, provider } = await createMockTree({ role: 'button', title: 'Lonely' });

    expect(root.hasChildren).toBe(false);
    await expect(root.loadChildrenIfNeeded()).resolves.toBe(false);
    expect(root.children).toHaveLength(0);
    expect(provider.callCount('childrenOf')).toBe(0);
  });

  test('loads children through the children accessor in provider order', async () => {
    const { root, engine } = await createMockTree(windowWith(BUTTONS));
    const loaded = vi.fn();
    engine.events.on('childrenLoaded', loaded);

    await expect(root.loadChildrenIfNeeded()).resolves.toBe(true);

    expect(root.children.map((child) => child.title)).toEqual(['OK', 'Cancel']);
    expect(root.children[0]?.parent).toBe(root);
    expect(loaded).toHaveBeenCalledWith({ element: root, strategy: 'childrenAccessor', count: 2 });
  });

  test('a second load leaves already loaded children untouched', async () => {
    const { root, provider } = await createMockTree(windowWith(BUTTONS));

    await root.loadChildrenIfNeeded();
    const first = [...root.children];
    await expect(root.loadChildrenIfNeeded()).resolves.toBe(true);

    expect(root.children).toEqual(first);
    expect(root.children[0]).toBe(first[0]);
    expect(provider.callCount('childrenOf')).toBe(1);
  });

  test('concurrent callers share one in-flight load', async () => {
    const { root, provider, rootHandle } = await createMockTree(windowWith(BUTTONS));
    provider.inject('childrenOf', rootHandle, { delayMs: 20 });

    const [a, b] = await Promise.all([root.loadChildrenIfNeeded(), root.loadChildrenIfNeeded()]);

    expect(a).toBe(true);
    expect(b).toBe(true);
    expect(root.children).toHaveLength(2);
    expect(provider.callCount('childrenOf', rootHandle)).toBe(1);
  });

  test('falls back to the AXChildren attribute when the accessor is empty', async () => {
    const { root, engine } = await createMockTree(windowWith(BUTTONS, { childrenVia: 'attribute' }));
    const loaded = vi.fn();
    engine.events.on('childrenLoaded', loaded);

    await expect(root.loadChildrenIfNeeded()).resolves.toBe(true);

    expect(root.children.map((child) => child.title)).toEqual(['OK', 'Cancel']);
    expect(loaded).toHaveBeenCalledWith(expect.objectContaining({ strategy: 'childrenAttribute' }));
  });

  test('falls back to raw handle lookup last', async () => {
    const { root, engine } = await createMockTree(windowWith(BUTTONS, { childrenVia: 'raw' }));
    const loaded = vi.fn();
    engine.events.on('childrenLoaded', loaded);

    await expect(root.loadChildrenIfNeeded()).resolves.toBe(true);

    expect(root.children).toHaveLength(2);
    expect(loaded).toHaveBeenCalledWith(expect.objectContaining({ strategy: 'rawHandle' }));
  });

  test('a hanging strategy is abandoned after the strategy timeout and the next one is tried', async () => {
    const { root, provider, rootHandle } = await createMockTree(
      windowWith(BUTTONS, { childrenVia: 'attribute' }),
    );
    provider.inject('childrenOf', rootHandle, { hang: true });

    await expect(root.loadChildrenIfNeeded()).resolves.toBe(true);
    expect(root.children.map((child) => child.title)).toEqual(['OK', 'Cancel']);
  });

  test('a rejecting strategy is skipped', async () => {
    const { root, provider, rootHandle } = await createMockTree(windowWith(BUTTONS, { childrenVia: 'raw' }));
    provider.inject('childrenOf', rootHandle, { error: new Error('accessor unavailable') });

    await expect(root.loadChildrenIfNeeded()).resolves.toBe(true);
    expect(root.children).toHaveLength(2);
  });

  test('marks children inaccessible when every strategy comes back empty', async () => {
    const { root, engine } = await createMockTree(
      windowWith([], { claimsChildren: true, childrenVia: 'none' }),
    );
    const inaccessible = vi.fn();
    engine.events.on('childrenInaccessible', inaccessible);

    await expect(root.loadChildrenIfNeeded()).resolves.toBe(false);

    expect(root.hasChildren).toBe(true);
    expect(root.childrenInaccessible).toBe(true);
    expect(root.children).toHaveLength(0);
    expect(inaccessible).toHaveBeenCalledWith({ element: root });
  });

  test('synthetic nodes answer from their attached children', async () => {
    const { engine } = await createMockTree();
    const parent = engine.createElement({ role: 'group', title: 'Synthetic' });
    const orphan = engine.createElement({ role: 'group', hasChildren: true });
    parent.addChild(engine.createElement({ role: 'button', title: 'Child' }));

    await expect(parent.loadChildrenIfNeeded()).resolves.toBe(true);
    await expect(orphan.loadChildrenIfNeeded()).resolves.toBe(false);
    expect(parent.hasChildren).toBe(true);
    expect(parent.children[0]?.parent).toBe(parent);
  });
});
