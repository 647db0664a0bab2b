/**
 * Action discovery and execution on a single element.
 *
 * Actions are checked against what the element advertises before the
 * provider is asked to perform them. Actions known to flake on first
 * invocation (press) get a short deadline and a second attempt; the rest
 * run once under the action timeout.
 */

import { z } from 'zod';
import {
  errorMessage,
  InvalidElementStateError,
  RetryExhaustedError,
  TimeoutError,
  UnsupportedActionError,
} from '../errors';
import { Attribute, BASELINE_ACTION } from '../provider/attributes';
import { withTimeoutAndRetry } from '../resilience/retry';
import { withTimeout } from '../resilience/timeout';
import { validateActionName } from '../validation';
import type { ElementNode } from './ElementNode';
import type { ElementActions, TreeContext } from './types';

const ActionListSchema = z.array(z.string());

function withBaseline(advertised: readonly string[]): string[] {
  const actions = [...new Set(advertised)];
  if (!actions.includes(BASELINE_ACTION)) actions.push(BASELINE_ACTION);
  return actions;
}

export class ActionInvoker<H> implements ElementActions<H> {
  constructor(private readonly ctx: TreeContext<H>) {}

  // ── Discovery ───────────────────────────────────────────────────────

  /** Provider order, de-duplicated, with "focus" always available. */
  async getAvailableActions(node: ElementNode<H>): Promise<string[]> {
    const handle = this.requireHandle(node, 'get available actions');
    return withBaseline(await this.readAdvertised(node, handle));
  }

  // ── Execution ───────────────────────────────────────────────────────

  async performAction(node: ElementNode<H>, action: string): Promise<void> {
    const name = validateActionName(action);
    const handle = this.requireHandle(node, `perform ${name}`);

    const advertised = await this.readAdvertised(node, handle);
    const available = withBaseline(advertised);
    if (!available.includes(name)) {
      throw new UnsupportedActionError(node.description, name, available);
    }

    const started = Date.now();

    if (name === BASELINE_ACTION && !advertised.includes(name)) {
      await this.focus(node);
    } else {
      await this.invoke(node, handle, name);
    }

    const durationMs = Date.now() - started;
    this.ctx.logger.info('action_performed', { element: node.description, action: name, durationMs });
    this.ctx.events.emit('actionPerformed', { element: node, action: name, durationMs });
  }

  async focus(node: ElementNode<H>): Promise<void> {
    const handle = this.requireHandle(node, 'focus');
    const { timeoutMs, maxAttempts, delayMs } = this.ctx.config.focus;

    try {
      await withTimeoutAndRetry(
        {
          timeoutMs,
          maxAttempts,
          delayMs,
          logger: this.ctx.logger,
          onRetry: (event) => this.ctx.events.emit('retrying', event),
        },
        () => this.ctx.provider.setAttributeValue(handle, Attribute.focused, true),
        `focus(${node.description})`,
      );
    } catch (err) {
      throw this.wrapFailure(node, 'focus', err);
    }

    node.markFocused();
  }

  // ── Attributes ──────────────────────────────────────────────────────

  /** Every readable attribute; a value that fails or hangs is skipped, not fatal. */
  async getAttributes(node: ElementNode<H>): Promise<Record<string, unknown>> {
    const handle = this.requireHandle(node, 'read attributes');
    const { provider, logger } = this.ctx;
    const timeoutMs = this.ctx.config.attribute.timeoutMs;

    let names: string[];
    try {
      names = await withTimeout(
        timeoutMs,
        () => provider.attributeNames(handle),
        `getAttributes(${node.description})`,
      );
    } catch (err) {
      throw this.wrapFailure(node, 'read attributes', err);
    }

    const attributes: Record<string, unknown> = {};
    for (const name of names) {
      try {
        attributes[name] = await withTimeout(
          timeoutMs,
          () => provider.attributeValue(handle, name),
          `getAttribute(${node.description}, ${name})`,
        );
      } catch (err) {
        logger.debug('attribute_read_failed', {
          element: node.description,
          attribute: name,
          error: errorMessage(err),
        });
      }
    }
    return attributes;
  }

  async getValue(node: ElementNode<H>): Promise<string | undefined> {
    const handle = this.requireHandle(node, 'read value');
    const value = await withTimeout(
      this.ctx.config.attribute.timeoutMs,
      () => this.ctx.provider.attributeValue(handle, Attribute.value),
      `getValue(${node.description})`,
    );
    return typeof value === 'string' ? value : undefined;
  }

  async setValue(node: ElementNode<H>, value: string): Promise<void> {
    const handle = this.requireHandle(node, 'set value');
    try {
      await withTimeout(
        this.ctx.config.action.timeoutMs,
        () => this.ctx.provider.setAttributeValue(handle, Attribute.value, value),
        `setValue(${node.description})`,
      );
    } catch (err) {
      throw this.wrapFailure(node, 'set value', err);
    }
    // Length only; field contents stay out of the log.
    this.ctx.logger.debug('value_set', { element: node.description, length: value.length });
  }

  // ── Internals ───────────────────────────────────────────────────────

  private async invoke(node: ElementNode<H>, handle: H, action: string): Promise<void> {
    const { action: cfg } = this.ctx.config;
    const label = `${action}(${node.description})`;

    try {
      if (cfg.flakyActions.includes(action)) {
        await withTimeoutAndRetry(
          {
            timeoutMs: cfg.flakyTimeoutMs,
            maxAttempts: cfg.flakyMaxAttempts,
            delayMs: cfg.flakyDelayMs,
            logger: this.ctx.logger,
            onRetry: (event) => this.ctx.events.emit('retrying', event),
          },
          () => this.ctx.provider.performAction(handle, action),
          label,
        );
      } else {
        await withTimeout(cfg.timeoutMs, () => this.ctx.provider.performAction(handle, action), label);
      }
    } catch (err) {
      if (err instanceof TimeoutError) {
        this.ctx.events.emit('operationTimedOut', { operation: label, durationMs: err.durationMs });
      }
      throw this.wrapFailure(node, action, err);
    }
  }

  /** AXActions as a string list; empty when unreadable. */
  private async readAdvertised(node: ElementNode<H>, handle: H): Promise<string[]> {
    try {
      const value = await withTimeout(
        this.ctx.config.attribute.timeoutMs,
        () => this.ctx.provider.attributeValue(handle, Attribute.actions),
        `getAvailableActions(${node.description})`,
      );
      const parsed = ActionListSchema.safeParse(value ?? []);
      if (parsed.success) return parsed.data;
      this.ctx.logger.warn('actions_unreadable', { element: node.description, reason: 'not a string list' });
    } catch (err) {
      this.ctx.logger.warn('actions_unreadable', { element: node.description, error: errorMessage(err) });
    }
    return [];
  }

  /** Deadline errors pass through unchanged; anything else names the action. */
  private wrapFailure(node: ElementNode<H>, action: string, err: unknown): Error {
    if (err instanceof TimeoutError || err instanceof RetryExhaustedError) return err;
    this.ctx.logger.error('action_failed', { element: node.description, action, error: errorMessage(err) });
    return new InvalidElementStateError(node.description, `failed to ${action}: ${errorMessage(err)}`);
  }

  private requireHandle(node: ElementNode<H>, operation: string): H {
    if (node.handle === undefined) {
      throw new InvalidElementStateError(node.description, `no provider handle to ${operation}`);
    }
    return node.handle;
  }
}
