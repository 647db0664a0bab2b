import { ElementTreeEngine } from '../../src/engine/ElementTreeEngine';
import type { EngineConfigOverrides } from '../../src/config/engine';
import { Logger } from '../../src/monitoring/logger';
import {
  MockAccessibilityProvider,
  type MockElementSpec,
  type MockHandle,
} from '../../src/provider/mock';
import type { ApplicationDirectory } from '../../src/provider/types';
import type { ElementNode } from '../../src/tree/ElementNode';

// ── Trees ───────────────────────────────────────────────────────────────

/** window → [toolbar → [OK, Cancel], textField "Search"] */
export const TOOLBAR_WINDOW: MockElementSpec = {
  role: 'window',
  title: 'Main Window',
  children: [
    {
      role: 'toolbar',
      title: 'Toolbar',
      children: [
        { role: 'button', title: 'OK', actions: ['press'] },
        { role: 'button', title: 'Cancel', actions: ['press'] },
      ],
    },
    { role: 'textField', title: 'Search', value: 'draft', actions: ['confirm'] },
  ],
};

// ── Engine factory ──────────────────────────────────────────────────────

/** Short timings so deadline tests finish quickly; flaky retries do not sleep. */
export const FAST_CONFIG: EngineConfigOverrides = {
  search: { timeoutMs: 500 },
  path: { timeoutMs: 500 },
  loader: { strategyTimeoutMs: 100 },
  attribute: { timeoutMs: 100 },
  action: { timeoutMs: 100, flakyTimeoutMs: 50, flakyDelayMs: 0 },
  focus: { timeoutMs: 50, delayMs: 0 },
};

function mergeConfig(base: EngineConfigOverrides, extra: EngineConfigOverrides = {}): EngineConfigOverrides {
  return {
    search: { ...base.search, ...extra.search },
    path: { ...base.path, ...extra.path },
    loader: { ...base.loader, ...extra.loader },
    attribute: { ...base.attribute, ...extra.attribute },
    action: { ...base.action, ...extra.action },
    focus: { ...base.focus, ...extra.focus },
  };
}

export function quietLogger(): Logger {
  return new Logger({ level: 'error', service: 'axtree-test' });
}

export interface MockTreeSetup {
  provider: MockAccessibilityProvider;
  engine: ElementTreeEngine<MockHandle>;
  rootHandle: MockHandle;
  root: ElementNode<MockHandle>;
  handle(title: string): MockHandle;
}

export async function createMockTree(
  spec: MockElementSpec = TOOLBAR_WINDOW,
  options: {
    config?: EngineConfigOverrides;
    logger?: Logger;
    applications?: ApplicationDirectory<MockHandle>;
  } = {},
): Promise<MockTreeSetup> {
  const provider = new MockAccessibilityProvider();
  const rootHandle = provider.build(spec);
  const engine = new ElementTreeEngine<MockHandle>({
    provider,
    applications: options.applications,
    logger: options.logger ?? quietLogger(),
    config: mergeConfig(FAST_CONFIG, options.config),
  });
  const root = await engine.elementFromHandle(rootHandle);

  return {
    provider,
    engine,
    rootHandle,
    root,
    handle(title: string): MockHandle {
      const found = provider.findHandle(rootHandle, title);
      if (!found) throw new Error(`fixture has no handle titled ${title}`);
      return found;
    },
  };
}
