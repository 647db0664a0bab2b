import type EventEmitter from 'eventemitter3';
import type { EngineConfig } from '../config/engine';
import type { Logger } from '../monitoring/logger';
import type { AccessibilityProvider } from '../provider/types';
import type { RetryEvent } from '../resilience/retry';
import type { ElementNode } from './ElementNode';

// ── Queries ─────────────────────────────────────────────────────────────

/** Predicates for a descendant search; omitted predicates match everything. */
export interface ElementQuery {
  /** Case-insensitive equality against role or subrole. */
  role?: string;
  /** Case-insensitive substring of title or role description. */
  title?: string;
}

export interface SearchOptions {
  /** Stop after this many matches (pre-order). */
  limit?: number;
  /** Outer deadline to honour in addition to the search's own. */
  signal?: AbortSignal;
}

export interface PathSegment {
  role: string;
  title: string;
}

// ── Snapshots ───────────────────────────────────────────────────────────

/** Plain view of the locally loaded subtree, for serializers. */
export interface ElementSnapshot {
  role: string;
  title: string;
  roleDescription: string;
  subRole: string;
  description: string;
  hasChildren: boolean;
  isFocused: boolean;
  ownerProcessID: number;
  childrenInaccessible: boolean;
  children: ElementSnapshot[];
}

// ── Events ──────────────────────────────────────────────────────────────

export interface ChildrenLoadedEvent<H> {
  element: ElementNode<H>;
  strategy: string;
  count: number;
}

export interface ActionPerformedEvent<H> {
  element: ElementNode<H>;
  action: string;
  durationMs: number;
}

export interface OperationTimedOutEvent {
  operation: string;
  durationMs: number;
}

export interface EngineEvents<H> {
  childrenLoaded: (event: ChildrenLoadedEvent<H>) => void;
  childrenInaccessible: (event: { element: ElementNode<H> }) => void;
  actionPerformed: (event: ActionPerformedEvent<H>) => void;
  operationTimedOut: (event: OperationTimedOutEvent) => void;
  retrying: (event: RetryEvent) => void;
}

export type EngineEventBus<H> = EventEmitter<EngineEvents<H>>;

// ── Context shared by nodes and components ──────────────────────────────

export interface ChildLoading<H> {
  loadChildrenIfNeeded(node: ElementNode<H>): Promise<boolean>;
}

export interface DescendantSearch<H> {
  findDescendants(
    root: ElementNode<H>,
    query?: ElementQuery,
    options?: SearchOptions,
  ): Promise<ElementNode<H>[]>;
}

export interface ElementActions<H> {
  getAvailableActions(node: ElementNode<H>): Promise<string[]>;
  performAction(node: ElementNode<H>, action: string): Promise<void>;
  focus(node: ElementNode<H>): Promise<void>;
  getAttributes(node: ElementNode<H>): Promise<Record<string, unknown>>;
  getValue(node: ElementNode<H>): Promise<string | undefined>;
  setValue(node: ElementNode<H>, value: string): Promise<void>;
}

/**
 * What every node and component reaches through. ElementTreeEngine
 * implements it; nodes hold it so their methods can delegate.
 */
export interface TreeContext<H> {
  readonly provider: AccessibilityProvider<H>;
  readonly logger: Logger;
  readonly config: EngineConfig;
  readonly events: EngineEventBus<H>;
  readonly loader: ChildLoading<H>;
  readonly search: DescendantSearch<H>;
  readonly actions: ElementActions<H>;
  elementFromHandle(handle: H): Promise<ElementNode<H>>;
}
