import { describe, expect, test } from 'vitest';
import { createMockTree, TOOLBAR_WINDOW } from '../../fixtures/mockTree';

describe('ElementNode', () => {
  describe('description', () => {
    test.each([
      [{ role: 'button', title: 'OK' }, 'button[OK]'],
      [{ role: 'button', title: 'Close', subRole: 'AXCloseButton', roleDescription: 'close button' }, 'button:AXCloseButton[Close] (close button)'],
      [{ role: 'button', title: 'Close', roleDescription: 'Close' }, 'button[Close]'],
      [{ role: 'image', roleDescription: 'image' }, 'image[image]'],
      [{ role: 'group' }, 'group'],
    ])('%o → %s', async (init, expected) => {
      const { engine } = await createMockTree();
      expect(engine.createElement(init).description).toBe(expected);
    });
  });

  test('defaults for a bare node', async () => {
    const { engine } = await createMockTree();
    const node = engine.createElement({ role: 'group' });

    expect(node.title).toBe('');
    expect(node.hasChildren).toBe(false);
    expect(node.isFocused).toBe(false);
    expect(node.childrenInaccessible).toBe(false);
    expect(node.ownerProcessID).toBe(0);
    expect(node.parent).toBeUndefined();
    expect(String(node)).toBe('group');
  });

  test('addChild links parent and child and flips hasChildren', async () => {
    const { engine } = await createMockTree();
    const group = engine.createElement({ role: 'group', title: 'Panel' });
    const button = engine.createElement({ role: 'button', title: 'Apply' });

    group.addChild(button);

    expect(group.hasChildren).toBe(true);
    expect(group.children).toEqual([button]);
    expect(button.parent).toBe(group);
    expect(button.ancestors()).toEqual([group]);
  });

  test('a synthetic tree is searchable without a provider', async () => {
    const { engine } = await createMockTree();
    const panel = engine.createElement({ role: 'group', title: 'Panel' });
    panel.addChild(engine.createElement({ role: 'button', title: 'Apply' }));
    panel.addChild(engine.createElement({ role: 'button', title: 'Reset' }));

    const buttons = await panel.findDescendants({ role: 'button' });
    expect(buttons.map((node) => node.title)).toEqual(['Apply', 'Reset']);
  });

  test('equals compares provider handles, or identity for synthetic nodes', async () => {
    const { engine, rootHandle, root } = await createMockTree(TOOLBAR_WINDOW);
    const again = await engine.elementFromHandle(rootHandle);
    const synthetic = engine.createElement({ role: 'window', title: 'Main Window' });

    expect(again).not.toBe(root);
    expect(again.equals(root)).toBe(true);
    expect(synthetic.equals(root)).toBe(false);
    expect(synthetic.equals(synthetic)).toBe(true);
  });

  test('pathFromRoot falls back to the role description for untitled elements', async () => {
    const { engine } = await createMockTree();
    const window = engine.createElement({ role: 'window', title: 'Main Window' });
    const close = engine.createElement({ role: 'button', roleDescription: 'close button' });
    window.addChild(close);

    expect(close.pathFromRoot()).toEqual([
      { role: 'window', title: 'Main Window' },
      { role: 'button', title: 'close button' },
    ]);
  });

  test('toSnapshot renders the loaded subtree up to a depth', async () => {
    const { root } = await createMockTree(TOOLBAR_WINDOW);
    await root.findDescendants();

    const shallow = root.toSnapshot(1);
    expect(shallow.children.map((child) => child.description)).toEqual(['toolbar[Toolbar]', 'textField[Search]']);
    expect(shallow.children[0]?.children).toEqual([]);

    const full = root.toSnapshot();
    expect(full.children[0]?.children.map((child) => child.title)).toEqual(['OK', 'Cancel']);
  });
});
