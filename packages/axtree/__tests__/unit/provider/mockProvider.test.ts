import { describe, expect, test } from 'vitest';
import { MockAccessibilityProvider } from '../../../src/provider/mock';

describe('MockAccessibilityProvider', () => {
  const spec = {
    role: 'window',
    title: 'Main Window',
    children: [{ role: 'button', title: 'OK', actions: ['press'] }],
  };

  test('answers identity and hierarchy from the built tree', async () => {
    const provider = new MockAccessibilityProvider();
    const root = provider.build(spec);

    await expect(provider.roleOf(root)).resolves.toBe('window');
    await expect(provider.hasChildren(root)).resolves.toBe(true);
    const [ok] = await provider.childrenOf(root);
    expect(ok?.spec.title).toBe('OK');
    expect(provider.findHandle(root, 'OK')).toBe(ok);
  });

  test('records every call', async () => {
    const provider = new MockAccessibilityProvider();
    const root = provider.build(spec);
    await provider.titleOf(root);
    await provider.attributeValue(root, 'AXRole');

    expect(provider.calls).toEqual([
      { operation: 'titleOf', handleId: root.id, argument: undefined },
      { operation: 'attributeValue', handleId: root.id, argument: 'AXRole' },
    ]);
  });

  test('an injected failure applies only the given number of times', async () => {
    const provider = new MockAccessibilityProvider();
    const root = provider.build(spec);
    provider.inject('roleOf', root, { error: new Error('stale'), times: 1 });

    await expect(provider.roleOf(root)).rejects.toThrow('stale');
    await expect(provider.roleOf(root)).resolves.toBe('window');
  });

  test('a wildcard fault applies to every handle until cleared', async () => {
    const provider = new MockAccessibilityProvider();
    const root = provider.build(spec);
    const ok = provider.findHandle(root, 'OK');
    provider.inject('titleOf', null, { error: new Error('offline') });

    await expect(provider.titleOf(root)).rejects.toThrow('offline');
    if (ok) await expect(provider.titleOf(ok)).rejects.toThrow('offline');

    provider.clearFaults();
    await expect(provider.titleOf(root)).resolves.toBe('Main Window');
  });

  test('setting AXFocused moves the focused element', async () => {
    const provider = new MockAccessibilityProvider();
    const root = provider.build(spec);
    const ok = provider.findHandle(root, 'OK');
    if (!ok) throw new Error('missing OK handle');

    await provider.setAttributeValue(ok, 'AXFocused', true);
    await expect(provider.attributeValue(root, 'AXFocusedElement')).resolves.toBe(ok);
  });
});
