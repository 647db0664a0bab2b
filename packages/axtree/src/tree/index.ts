export { ElementNode, type ElementInit } from './ElementNode';
export { buildElement } from './elementFactory';
export { ChildLoader } from './ChildLoader';
export { SearchEngine, matchesQuery, describeQuery } from './SearchEngine';
export { PathResolver, parsePath, formatPath } from './PathResolver';
export { ActionInvoker } from './ActionInvoker';
export type {
  ElementQuery,
  SearchOptions,
  PathSegment,
  ElementSnapshot,
  ChildrenLoadedEvent,
  ActionPerformedEvent,
  OperationTimedOutEvent,
  EngineEvents,
  EngineEventBus,
  ChildLoading,
  DescendantSearch,
  ElementActions,
  TreeContext,
} from './types';
