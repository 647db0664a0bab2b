export type {
  AccessibilityProvider,
  ApplicationDirectory,
  ApplicationRecord,
  WindowRecord,
  Frame,
} from './types';
export { Attribute, BASELINE_ACTION, type AttributeKey } from './attributes';
export {
  MockAccessibilityProvider,
  MockApplicationDirectory,
  MockHandle,
  type MockElementSpec,
  type MockChildrenSurface,
  type MockFault,
  type MockOperation,
  type MockCall,
  type MockProviderConfig,
} from './mock';
