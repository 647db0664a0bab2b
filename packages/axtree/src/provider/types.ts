/**
 * Boundary to the out-of-process accessibility provider.
 *
 * All element access in axtree goes through this interface. `H` is the
 * provider's opaque element handle; the engine never looks inside it.
 * Any method may hang indefinitely or reject, so every call made by the
 * engine is wrapped in a timeout.
 */
export interface AccessibilityProvider<H> {
  // -- Identity --

  roleOf(handle: H): Promise<string | undefined>;

  titleOf(handle: H): Promise<string | undefined>;

  /** Owning process; providers that cannot tell may omit this. */
  processIdOf?(handle: H): Promise<number>;

  // -- Attributes --

  attributeNames(handle: H): Promise<string[]>;

  attributeValue(handle: H, key: string): Promise<unknown>;

  setAttributeValue(handle: H, key: string, value: unknown): Promise<void>;

  /** Narrow an opaque attribute value (AXChildren, AXFocusedElement) to a handle. */
  isElementHandle(value: unknown): value is H;

  // -- Hierarchy --

  hasChildren(handle: H): Promise<boolean>;

  /** Structured children accessor; the first surface the loader tries. */
  childrenOf(handle: H): Promise<H[]>;

  /** Lower-level, handle-based lookup used when the other surfaces come back empty. */
  rawChildrenOf?(handle: H): Promise<H[]>;

  // -- Actions --

  performAction(handle: H, action: string): Promise<void>;
}

// -- Discovery records --

export interface Frame {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface ApplicationRecord {
  name: string;
  pid: number;
  bundleIdentifier?: string;
  isFrontmost: boolean;
}

export interface WindowRecord<H> {
  title: string;
  frame: Frame;
  pid: number;
  isFullscreen: boolean;
  /** Provider handle of the window element, when the discovery layer has one. */
  handle?: H;
}

/**
 * Application and window discovery, implemented outside the engine.
 * Only the focused-element lookup depends on it.
 */
export interface ApplicationDirectory<H> {
  focusedApplication(): Promise<ApplicationRecord | null>;
  focusedWindow(application: ApplicationRecord): Promise<WindowRecord<H> | null>;
}
