/**
 * The entry point callers hold on to.
 *
 * Owns the provider, logger, resolved timing config and event bus, and wires
 * the child loader, search engine, path resolver and action invoker to every
 * node it creates. Nodes created by one engine delegate back to it.
 * Subscribe through `engine.events`.
 */

import EventEmitter from 'eventemitter3';
import { resolveEngineConfig, type EngineConfig, type EngineConfigOverrides } from '../config/engine';
import {
  ApplicationNotFoundError,
  ElementNotFoundError,
  errorMessage,
  InvalidElementStateError,
  OperationNotSupportedError,
  TimeoutError,
  WindowNotFoundError,
} from '../errors';
import { attempt } from '../errors/result';
import { getLogger, type Logger } from '../monitoring/logger';
import { Attribute } from '../provider/attributes';
import type { AccessibilityProvider, ApplicationDirectory, WindowRecord } from '../provider/types';
import { withTimeout } from '../resilience/timeout';
import { ActionInvoker } from '../tree/ActionInvoker';
import { ChildLoader } from '../tree/ChildLoader';
import { ElementNode, type ElementInit } from '../tree/ElementNode';
import { buildElement } from '../tree/elementFactory';
import { PathResolver } from '../tree/PathResolver';
import { SearchEngine } from '../tree/SearchEngine';
import type { ElementQuery, EngineEventBus, EngineEvents, TreeContext } from '../tree/types';

export interface ElementTreeEngineOptions<H> {
  provider: AccessibilityProvider<H>;
  /** Needed only for getFocusedElement(). */
  applications?: ApplicationDirectory<H>;
  logger?: Logger;
  config?: EngineConfigOverrides;
}

export class ElementTreeEngine<H> implements TreeContext<H> {
  readonly provider: AccessibilityProvider<H>;
  readonly logger: Logger;
  readonly config: EngineConfig;
  readonly events: EngineEventBus<H> = new EventEmitter<EngineEvents<H>>();

  readonly loader: ChildLoader<H>;
  readonly search: SearchEngine<H>;
  readonly paths: PathResolver<H>;
  readonly actions: ActionInvoker<H>;

  private readonly applications: ApplicationDirectory<H> | undefined;

  constructor(options: ElementTreeEngineOptions<H>) {
    this.provider = options.provider;
    this.applications = options.applications;
    this.logger = (options.logger ?? getLogger()).child({ component: 'element-tree' });
    this.config = resolveEngineConfig(options.config);

    this.loader = new ChildLoader(this);
    this.search = new SearchEngine(this);
    this.paths = new PathResolver(this);
    this.actions = new ActionInvoker(this);
  }

  // ── Construction ────────────────────────────────────────────────────

  /** A node bound to this engine; without a handle it is purely synthetic. */
  createElement(init: ElementInit<H>): ElementNode<H> {
    return new ElementNode(init, this);
  }

  elementFromHandle(handle: H): Promise<ElementNode<H>> {
    return buildElement(this, handle);
  }

  /** Root node for a window handed over by the discovery layer. */
  async rootFromWindow(window: WindowRecord<H>): Promise<ElementNode<H>> {
    if (window.handle === undefined) {
      return this.createElement({ role: 'window', title: window.title, ownerProcessID: window.pid });
    }
    return this.elementFromHandle(window.handle);
  }

  // ── Search ──────────────────────────────────────────────────────────

  findElements(root: ElementNode<H>, query: ElementQuery = {}): Promise<ElementNode<H>[]> {
    return this.search.findDescendants(root, query);
  }

  findElementsOrEmpty(root: ElementNode<H>, query: ElementQuery = {}): Promise<ElementNode<H>[]> {
    return attempt(() => this.findElements(root, query), [], this.logger, 'findElements');
  }

  findElementByPath(path: string, root: ElementNode<H>): Promise<ElementNode<H>> {
    return this.paths.findElementByPath(path, root);
  }

  findElementByPathOrNull(path: string, root: ElementNode<H>): Promise<ElementNode<H> | null> {
    return attempt<ElementNode<H> | null>(
      () => this.findElementByPath(path, root),
      null,
      this.logger,
      'findElementByPath',
    );
  }

  // ── Focus ───────────────────────────────────────────────────────────

  /** Focused application, then its focused window, then that window's AXFocusedElement. */
  async getFocusedElement(): Promise<ElementNode<H>> {
    const { applications } = this;
    if (!applications) {
      throw new OperationNotSupportedError('getFocusedElement without an application directory');
    }

    const application = await this.focusStep('focusedApplication', () => applications.focusedApplication());
    if (!application) throw new ApplicationNotFoundError('No focused application');

    const window = await this.focusStep('focusedWindow', () => applications.focusedWindow(application));
    if (!window) throw new WindowNotFoundError(`No focused window in ${application.name}`);

    const windowHandle = window.handle;
    if (windowHandle === undefined) {
      throw new InvalidElementStateError(`window[${window.title}]`, 'no provider handle');
    }

    let focused: unknown;
    try {
      focused = await this.focusStep('getFocusedElement', () =>
        this.provider.attributeValue(windowHandle, Attribute.focusedElement),
      );
    } catch (err) {
      if (err instanceof TimeoutError) throw err;
      throw new ElementNotFoundError(`focused element in ${window.title}`, { error: errorMessage(err) });
    }

    if (!this.provider.isElementHandle(focused)) {
      throw new ElementNotFoundError(`focused element in ${window.title}`);
    }

    const element = await this.elementFromHandle(focused);
    element.markFocused();
    return element;
  }

  getFocusedElementOrNull(): Promise<ElementNode<H> | null> {
    return attempt<ElementNode<H> | null>(
      () => this.getFocusedElement(),
      null,
      this.logger,
      'getFocusedElement',
    );
  }

  /** Each lookup step gets the attribute deadline; an expiry is announced on the bus. */
  private async focusStep<T>(label: string, work: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(this.config.attribute.timeoutMs, work, label);
    } catch (err) {
      if (err instanceof TimeoutError) {
        this.events.emit('operationTimedOut', { operation: err.operation, durationMs: err.durationMs });
      }
      throw err;
    }
  }
}
