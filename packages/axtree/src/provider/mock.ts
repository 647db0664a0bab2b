import type {
  AccessibilityProvider,
  ApplicationDirectory,
  ApplicationRecord,
  WindowRecord,
} from './types';
import { Attribute } from './attributes';
import { sleep } from '../resilience/timeout';

/** Which provider surface exposes an element's children. */
export type MockChildrenSurface = 'accessor' | 'attribute' | 'raw' | 'none';

export interface MockElementSpec {
  role: string;
  title?: string;
  roleDescription?: string;
  subRole?: string;
  actions?: string[];
  value?: string;
  pid?: number;
  attributes?: Record<string, unknown>;
  children?: MockElementSpec[];
  /** Default: 'accessor' */
  childrenVia?: MockChildrenSurface;
  /** Report hasChildren=true even when no child is reachable */
  claimsChildren?: boolean;
}

export type MockOperation =
  | 'roleOf'
  | 'titleOf'
  | 'processIdOf'
  | 'attributeNames'
  | 'attributeValue'
  | 'setAttributeValue'
  | 'hasChildren'
  | 'childrenOf'
  | 'rawChildrenOf'
  | 'performAction';

export interface MockFault {
  /** Never settle. */
  hang?: boolean;
  /** Extra latency before answering. */
  delayMs?: number;
  /** Reject with this error. */
  error?: Error;
  /** Only the next N calls are affected (default: every call). */
  times?: number;
}

export interface MockCall {
  operation: MockOperation;
  handleId: number;
  argument?: string;
}

export interface MockProviderConfig {
  /** Latency added to every call (default: 0) */
  latencyMs?: number;
}

export class MockHandle {
  readonly children: MockHandle[] = [];
  readonly attributes = new Map<string, unknown>();
  readonly performed: string[] = [];

  constructor(
    readonly id: number,
    readonly spec: Omit<MockElementSpec, 'children'>,
    readonly parent: MockHandle | null,
  ) {}

  get childrenVia(): MockChildrenSurface {
    return this.spec.childrenVia ?? 'accessor';
  }
}

interface ArmedFault {
  fault: MockFault;
  remaining: number;
}

/**
 * In-memory accessibility provider for tests and synthetic trees.
 * Does NOT talk to any real accessibility API -- answers from a handle tree
 * built from MockElementSpec, with injectable hangs, delays and failures.
 */
export class MockAccessibilityProvider implements AccessibilityProvider<MockHandle> {
  readonly calls: MockCall[] = [];
  private nextId = 1;
  private faults = new Map<string, ArmedFault>();
  private focused: MockHandle | null = null;
  private latencyMs: number;

  constructor(config: MockProviderConfig = {}) {
    this.latencyMs = config.latencyMs ?? 0;
  }

  // ── Tree construction ─────────────────────────────────────────────────

  build(spec: MockElementSpec, parent: MockHandle | null = null): MockHandle {
    const { children = [], ...own } = spec;
    const handle = new MockHandle(this.nextId++, own, parent);

    handle.attributes.set(Attribute.role, own.role);
    if (own.title !== undefined) handle.attributes.set(Attribute.title, own.title);
    if (own.roleDescription !== undefined) handle.attributes.set(Attribute.roleDescription, own.roleDescription);
    if (own.subRole !== undefined) handle.attributes.set(Attribute.subRole, own.subRole);
    if (own.actions !== undefined) handle.attributes.set(Attribute.actions, [...own.actions]);
    if (own.value !== undefined) handle.attributes.set(Attribute.value, own.value);
    for (const [key, value] of Object.entries(own.attributes ?? {})) {
      handle.attributes.set(key, value);
    }

    for (const child of children) {
      handle.children.push(this.build(child, handle));
    }
    return handle;
  }

  /** First handle in pre-order under `root` whose title equals `title`. */
  findHandle(root: MockHandle, title: string): MockHandle | undefined {
    if (root.spec.title === title) return root;
    for (const child of root.children) {
      const found = this.findHandle(child, title);
      if (found) return found;
    }
    return undefined;
  }

  setFocused(handle: MockHandle | null): void {
    this.focused = handle;
  }

  // ── Fault injection ───────────────────────────────────────────────────

  /** Arm a fault for one operation, on one handle or (handle = null) on all. */
  inject(operation: MockOperation, handle: MockHandle | null, fault: MockFault): void {
    this.faults.set(faultKey(operation, handle), {
      fault,
      remaining: fault.times ?? Number.POSITIVE_INFINITY,
    });
  }

  clearFaults(): void {
    this.faults.clear();
  }

  callCount(operation: MockOperation, handle?: MockHandle): number {
    return this.calls.filter(
      (call) => call.operation === operation && (!handle || call.handleId === handle.id),
    ).length;
  }

  // ── AccessibilityProvider ─────────────────────────────────────────────

  roleOf(handle: MockHandle): Promise<string | undefined> {
    return this.answer('roleOf', handle, () => handle.spec.role);
  }

  titleOf(handle: MockHandle): Promise<string | undefined> {
    return this.answer('titleOf', handle, () => handle.spec.title);
  }

  processIdOf(handle: MockHandle): Promise<number> {
    return this.answer('processIdOf', handle, () => handle.spec.pid ?? 0);
  }

  attributeNames(handle: MockHandle): Promise<string[]> {
    return this.answer('attributeNames', handle, () => {
      const names = [...handle.attributes.keys()];
      if (handle.childrenVia === 'attribute') names.push(Attribute.children);
      return names;
    });
  }

  attributeValue(handle: MockHandle, key: string): Promise<unknown> {
    return this.answer(
      'attributeValue',
      handle,
      () => {
        if (key === Attribute.children) {
          return handle.childrenVia === 'attribute' ? [...handle.children] : undefined;
        }
        if (key === Attribute.focusedElement) {
          return this.focused ?? undefined;
        }
        return handle.attributes.get(key);
      },
      key,
    );
  }

  setAttributeValue(handle: MockHandle, key: string, value: unknown): Promise<void> {
    return this.answer(
      'setAttributeValue',
      handle,
      () => {
        handle.attributes.set(key, value);
        if (key === Attribute.focused && value === true) this.focused = handle;
      },
      key,
    );
  }

  isElementHandle(value: unknown): value is MockHandle {
    return value instanceof MockHandle;
  }

  hasChildren(handle: MockHandle): Promise<boolean> {
    return this.answer(
      'hasChildren',
      handle,
      () => handle.spec.claimsChildren ?? handle.children.length > 0,
    );
  }

  childrenOf(handle: MockHandle): Promise<MockHandle[]> {
    return this.answer('childrenOf', handle, () =>
      handle.childrenVia === 'accessor' ? [...handle.children] : [],
    );
  }

  rawChildrenOf(handle: MockHandle): Promise<MockHandle[]> {
    return this.answer('rawChildrenOf', handle, () =>
      handle.childrenVia === 'raw' ? [...handle.children] : [],
    );
  }

  performAction(handle: MockHandle, action: string): Promise<void> {
    return this.answer(
      'performAction',
      handle,
      () => {
        handle.performed.push(action);
      },
      action,
    );
  }

  // ── Internals ─────────────────────────────────────────────────────────

  private async answer<T>(
    operation: MockOperation,
    handle: MockHandle,
    produce: () => T,
    argument?: string,
  ): Promise<T> {
    this.calls.push({ operation, handleId: handle.id, argument });

    const fault = this.takeFault(operation, handle);
    if (this.latencyMs > 0) await sleep(this.latencyMs);

    if (fault) {
      if (fault.hang) return new Promise<T>(() => {});
      if (fault.delayMs) await sleep(fault.delayMs);
      if (fault.error) throw fault.error;
    }
    return produce();
  }

  private takeFault(operation: MockOperation, handle: MockHandle): MockFault | null {
    const armed =
      this.faults.get(faultKey(operation, handle)) ?? this.faults.get(faultKey(operation, null));
    if (!armed || armed.remaining <= 0) return null;
    armed.remaining--;
    return armed.fault;
  }
}

function faultKey(operation: MockOperation, handle: MockHandle | null): string {
  return `${operation}:${handle ? handle.id : '*'}`;
}

/** Fixed answer for the focused application/window lookup. */
export class MockApplicationDirectory<H> implements ApplicationDirectory<H> {
  constructor(
    private application: ApplicationRecord | null,
    private window: WindowRecord<H> | null = null,
  ) {}

  async focusedApplication(): Promise<ApplicationRecord | null> {
    return this.application;
  }

  async focusedWindow(_application: ApplicationRecord): Promise<WindowRecord<H> | null> {
    return this.window;
  }
}
