/** Attribute keys the engine reads or writes through the provider. */
export const Attribute = {
  role: 'AXRole',
  title: 'AXTitle',
  roleDescription: 'AXRoleDescription',
  subRole: 'AXSubrole',
  children: 'AXChildren',
  focused: 'AXFocused',
  focusedElement: 'AXFocusedElement',
  actions: 'AXActions',
  value: 'AXValue',
} as const;

export type AttributeKey = (typeof Attribute)[keyof typeof Attribute];

/** Every element can at least take focus, whatever the provider advertises. */
export const BASELINE_ACTION = 'focus';
