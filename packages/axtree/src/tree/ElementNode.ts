/**
 * One UI element and its locally known subtree.
 *
 * Children are owned by the node and stay empty until the child loader
 * fills them; `hasChildren` (read from the provider at construction) is the
 * authoritative "may have children" signal and is never revised downward.
 * The parent link is a WeakRef, so a node never keeps its ancestors alive.
 */

import type {
  ElementQuery,
  ElementSnapshot,
  PathSegment,
  SearchOptions,
  TreeContext,
} from './types';

export interface ElementInit<H> {
  role: string;
  title?: string;
  roleDescription?: string;
  subRole?: string;
  hasChildren?: boolean;
  ownerProcessID?: number;
  isFocused?: boolean;
  handle?: H;
}

export class ElementNode<H = unknown> {
  readonly role: string;
  readonly title: string;
  readonly roleDescription: string;
  readonly subRole: string;
  readonly ownerProcessID: number;
  readonly handle: H | undefined;

  private _hasChildren: boolean;
  private _isFocused: boolean;
  private _childrenInaccessible = false;
  private readonly _children: ElementNode<H>[] = [];
  private parentRef: WeakRef<ElementNode<H>> | undefined;

  constructor(
    init: ElementInit<H>,
    private readonly ctx: TreeContext<H>,
  ) {
    this.role = init.role;
    this.title = init.title ?? '';
    this.roleDescription = init.roleDescription ?? '';
    this.subRole = init.subRole ?? '';
    this.ownerProcessID = init.ownerProcessID ?? 0;
    this.handle = init.handle;
    this._hasChildren = init.hasChildren ?? false;
    this._isFocused = init.isFocused ?? false;
  }

  // ── State ───────────────────────────────────────────────────────────

  get hasChildren(): boolean {
    return this._hasChildren;
  }

  get isFocused(): boolean {
    return this._isFocused;
  }

  /**
   * True when the provider reported children but none of the loader's
   * strategies could reach them. Soft signal only: the children may exist.
   */
  get childrenInaccessible(): boolean {
    return this._childrenInaccessible;
  }

  get children(): readonly ElementNode<H>[] {
    return this._children;
  }

  get parent(): ElementNode<H> | undefined {
    return this.parentRef?.deref();
  }

  /** e.g. `button:AXCloseButton[Close] (close button)` */
  get description(): string {
    let desc = this.role;
    if (this.subRole) desc += `:${this.subRole}`;

    if (this.title) {
      desc += `[${this.title}]`;
      if (this.roleDescription && this.roleDescription !== this.title) {
        desc += ` (${this.roleDescription})`;
      }
    } else if (this.roleDescription) {
      desc += `[${this.roleDescription}]`;
    }
    return desc;
  }

  /** Same provider handle, or the very same node when either lacks one. */
  equals(other: ElementNode<H>): boolean {
    if (this.handle !== undefined && other.handle !== undefined) {
      return this.handle === other.handle;
    }
    return this === other;
  }

  // ── Structure ───────────────────────────────────────────────────────

  /** Direct append for synthetic trees; bypasses the loader. */
  addChild(child: ElementNode<H>): void {
    child.parentRef = new WeakRef(this);
    this._children.push(child);
    this._hasChildren = true;
  }

  /**
   * Install loaded children. Only the child loader calls this, and only
   * while the node has none (loaded-once).
   */
  attachLoadedChildren(children: readonly ElementNode<H>[]): boolean {
    if (this._children.length > 0 || children.length === 0) return false;
    for (const child of children) {
      child.parentRef = new WeakRef(this);
      this._children.push(child);
    }
    this._childrenInaccessible = false;
    return true;
  }

  markChildrenInaccessible(): void {
    this._childrenInaccessible = true;
  }

  markFocused(): void {
    this._isFocused = true;
  }

  /** Nearest first, up to the root. */
  ancestors(): ElementNode<H>[] {
    const chain: ElementNode<H>[] = [];
    let current = this.parent;
    while (current) {
      chain.push(current);
      current = current.parent;
    }
    return chain;
  }

  /**
   * Path segments from the topmost reachable ancestor down to this node.
   * Elements without a title are addressed by their role description.
   */
  pathFromRoot(): PathSegment[] {
    return [...this.ancestors().reverse(), this].map((node) => ({
      role: node.role,
      title: node.title || node.roleDescription,
    }));
  }

  toSnapshot(maxDepth = Number.POSITIVE_INFINITY): ElementSnapshot {
    return {
      role: this.role,
      title: this.title,
      roleDescription: this.roleDescription,
      subRole: this.subRole,
      description: this.description,
      hasChildren: this.hasChildren,
      isFocused: this.isFocused,
      ownerProcessID: this.ownerProcessID,
      childrenInaccessible: this.childrenInaccessible,
      children: maxDepth > 0 ? this._children.map((child) => child.toSnapshot(maxDepth - 1)) : [],
    };
  }

  // ── Delegated operations ────────────────────────────────────────────

  loadChildrenIfNeeded(): Promise<boolean> {
    return this.ctx.loader.loadChildrenIfNeeded(this);
  }

  findDescendants(query: ElementQuery = {}, options?: SearchOptions): Promise<ElementNode<H>[]> {
    return this.ctx.search.findDescendants(this, query, options);
  }

  getAvailableActions(): Promise<string[]> {
    return this.ctx.actions.getAvailableActions(this);
  }

  performAction(action: string): Promise<void> {
    return this.ctx.actions.performAction(this, action);
  }

  focus(): Promise<void> {
    return this.ctx.actions.focus(this);
  }

  getAttributes(): Promise<Record<string, unknown>> {
    return this.ctx.actions.getAttributes(this);
  }

  getValue(): Promise<string | undefined> {
    return this.ctx.actions.getValue(this);
  }

  setValue(value: string): Promise<void> {
    return this.ctx.actions.setValue(this, value);
  }

  toString(): string {
    return this.description;
  }
}
