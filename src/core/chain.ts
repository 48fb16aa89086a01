/**
 * API Assert - Assertion Chain
 *
 * Every assertion object (ValueAssert, ObjectAssert, ...) holds a chain.
 * Chains are linked into a tree: each nested call creates a child chain, so
 *
 *   expect.response(res).json().object().value('id').isEqual(1)
 *
 * produces the path response().json().object().value("id").isEqual().
 *
 * There are two ways to create a child:
 *
 * - enter() / leave(): a temporary chain for one assertion. Use fail() in
 *   between to record failures. leave() closes the chain, marks ancestors as
 *   having failed children, and either reports the outcome to the assertion
 *   handler or hands the failure to the enclosing entered chain.
 *
 * - clone(): an independent chain for a nested assertion object. A clone
 *   copies its source's path and failed flag but keeps its own state.
 *
 * Typical workflow:
 *
 *   const opChain = this.chain.enter('isEqual()');
 *   try {
 *     if (opChain.failed()) return this;
 *     if (!equal) opChain.fail({ type: 'equal', ... });
 *     return new ValueAssert(opChain.clone(), value);
 *   } finally {
 *     opChain.leave();
 *   }
 */

import { format } from 'node:util';

import { UsageError } from '../errors';
import type {
  AssertionContext,
  AssertionFailure,
  AssertionHandler,
  AssertionSeverity,
  RequestSnapshot,
  ResolvedConfig,
  ResponseSnapshot,
} from '../types';
import { Environment } from './environment';
import { isAssertionType, validateFailure } from './failure';

// ============================================================================
// Types
// ============================================================================

type ChainState = 'root' | 'cloned' | 'entered';

/**
 * Invoked synchronously from fail()
 */
export type FailCallback = (failure: AssertionFailure) => void;

interface PendingFailure {
  context: AssertionContext;
  failure: AssertionFailure;
}

interface ChainInit {
  parent: Chain | null;
  state: ChainState;
  failed: boolean;
  path: string[];
  aliasedPath: string[];
  severity: AssertionSeverity;
  handler: AssertionHandler;
  validateFailures: boolean;
  failCallback?: FailCallback;
  testName?: string;
  requestName?: string;
  request?: RequestSnapshot;
  response?: ResponseSnapshot;
  environment?: Environment;
}

// ============================================================================
// Chain
// ============================================================================

export class Chain {
  private readonly parent: Chain | null;
  private readonly state: ChainState;
  private readonly handler: AssertionHandler;
  private readonly validateFailures: boolean;
  private readonly testName?: string;

  private path: string[];
  private aliasedPath: string[];
  private aliased = false;
  private severity: AssertionSeverity;

  private ownFailed: boolean;
  private failedChildren = false;
  private pending?: PendingFailure;

  private closed = false;
  private isRoot = false;
  private openChildren = 0;

  private failCallback?: FailCallback;
  private ownCallback = false;

  private requestName?: string;
  private request?: RequestSnapshot;
  private response?: ResponseSnapshot;
  private environment?: Environment;

  private constructor(init: ChainInit) {
    this.parent = init.parent;
    this.state = init.state;
    this.ownFailed = init.failed;
    this.path = init.path;
    this.aliasedPath = init.aliasedPath;
    this.severity = init.severity;
    this.handler = init.handler;
    this.validateFailures = init.validateFailures;
    this.failCallback = init.failCallback;
    this.testName = init.testName;
    this.requestName = init.requestName;
    this.request = init.request;
    this.response = init.response;
    this.environment = init.environment;
  }

  /**
   * Create a root chain.
   * If the config has no environment, a new one is attached.
   */
  static create(name: string, config: ResolvedConfig): Chain {
    const chain = new Chain({
      parent: null,
      state: 'root',
      failed: false,
      path: name ? [name] : [],
      aliasedPath: name ? [name] : [],
      severity: config.severity,
      handler: config.handler,
      validateFailures: config.validateFailures,
      testName: config.testName,
      environment: config.environment,
    });

    if (!chain.environment) {
      chain.environment = new Environment(config);
    }

    return chain;
  }

  // ==========================================================================
  // Tree Operations
  // ==========================================================================

  /**
   * Create an independent chain with the same path and failed flag.
   * Failures of its entered children still propagate through it to this chain.
   */
  clone(): Chain {
    this.ensureOpen('clone');
    return this.derive('cloned');
  }

  /**
   * Create a temporary chain for one assertion, appending a path segment.
   * The name is passed through util.format when args are given.
   * You must call leave() on the returned chain.
   */
  enter(name: string, ...args: unknown[]): Chain {
    this.ensureOpen('enter');

    const segment = formatSegment(name, args);
    if (segment === '' && this.path.length === 0) {
      throw new UsageError('enter() requires a name when the path is empty');
    }

    const child = this.derive('entered');
    if (segment !== '') {
      child.path.push(segment);
      child.aliasedPath.push(segment);
    }

    this.openChildren++;
    return child;
  }

  /**
   * Overwrite the last path segment of this chain in place
   */
  replace(name: string, ...args: unknown[]): void {
    this.ensureOpen('replace');

    if (this.path.length === 0) {
      throw new UsageError('replace() requires a non-empty path');
    }

    const segment = formatSegment(name, args);
    this.path[this.path.length - 1] = segment;

    if (!this.aliased && this.aliasedPath.length > 0) {
      this.aliasedPath[this.aliasedPath.length - 1] = segment;
    }
  }

  /**
   * Finalize the assertion started by enter().
   * The chain can't be used after this call.
   */
  leave(): void {
    if (this.state !== 'entered') {
      throw new UsageError('leave() allowed only on chains created by enter()');
    }
    if (this.closed) {
      throw new UsageError('leave() called twice');
    }
    if (this.openChildren > 0) {
      throw new UsageError('leave() called before nested chains were left');
    }

    this.closed = true;

    const parent = this.parent;
    if (parent) {
      parent.openChildren--;
    }

    const treeFailed = this.treeFailed();
    if (treeFailed && !this.isRoot) {
      this.markAncestors();
    }

    if (this.isReportingPoint()) {
      if (this.pending) {
        this.reportPending();
      } else if (!treeFailed) {
        this.handler.success(this.context());
      }
    } else if (parent && this.pending) {
      parent.pending ??= this.pending;
      this.pending = undefined;
    }
  }

  // ==========================================================================
  // Failures
  // ==========================================================================

  /**
   * Record a failure on this chain.
   *
   * Only the first failure is kept. Entered chains report it when the
   * outermost entered chain is left; root and cloned chains report it
   * immediately.
   */
  fail(failure: AssertionFailure): void {
    this.ensureOpen('fail');

    if (!isAssertionType(failure.type)) {
      throw new UsageError(`unknown assertion type ${String(failure.type)}`);
    }
    if (this.validateFailures) {
      const problem = validateFailure(failure);
      if (problem) {
        throw new UsageError(problem);
      }
    }

    const record: AssertionFailure = Object.freeze({
      ...failure,
      severity: failure.severity ?? this.severity,
      errors: Object.freeze([...failure.errors]),
    });

    const firstFailure = !this.ownFailed;
    this.ownFailed = true;

    if (firstFailure) {
      this.pending = { context: this.context(), failure: record };
    }

    if (this.failCallback) {
      this.failCallback(record);
    }

    if (firstFailure && this.state !== 'entered') {
      this.markAncestors();
      this.reportPending();
    }
  }

  /**
   * Mark this chain failed without recording or reporting a failure.
   * Chains created from it afterwards start failed too.
   */
  setFailed(): void {
    this.ensureOpen('setFailed');
    this.ownFailed = true;
  }

  /**
   * Check if fail() was called on this chain, or on the chain it was
   * created from before the creation
   */
  failed(): boolean {
    return this.ownFailed;
  }

  /**
   * Check if this chain or any of its descendants failed
   */
  treeFailed(): boolean {
    return this.ownFailed || this.failedChildren;
  }

  // ==========================================================================
  // Settings
  // ==========================================================================

  /**
   * Stop failure propagation at this chain.
   * Failures below it are still visible via treeFailed() here.
   */
  setRoot(): void {
    this.ensureOpen('setRoot');
    this.isRoot = true;
  }

  /**
   * Set severity of future failures of this chain and of chains created from it
   */
  setSeverity(severity: AssertionSeverity): void {
    this.ensureOpen('setSeverity');
    this.severity = severity;
  }

  /**
   * Install a hook invoked by fail() on this chain and on chains created
   * from it afterwards
   */
  setFailCallback(callback: FailCallback): void {
    this.ensureOpen('setFailCallback');

    if (this.ownCallback) {
      throw new UsageError('fail callback already set');
    }

    this.failCallback = callback;
    this.ownCallback = true;
  }

  /**
   * Replace the displayed path with the alias.
   * An empty alias clears the displayed path.
   */
  setAlias(name: string): void {
    this.ensureOpen('setAlias');
    this.aliasedPath = name ? [name] : [];
    this.aliased = true;
  }

  setRequestName(name: string): void {
    this.ensureOpen('setRequestName');
    this.requestName = name;
  }

  setRequest(request: RequestSnapshot): void {
    this.ensureOpen('setRequest');

    if (this.request) {
      throw new UsageError('request already set');
    }
    this.request = request;
  }

  setResponse(response: ResponseSnapshot): void {
    this.ensureOpen('setResponse');

    if (this.response) {
      throw new UsageError('response already set');
    }
    this.response = response;
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  env(): Environment {
    if (!this.environment) {
      throw new UsageError('environment is not attached to this chain');
    }
    return this.environment;
  }

  /**
   * Snapshot of the current assertion context
   */
  context(): AssertionContext {
    return {
      testName: this.testName,
      requestName: this.requestName,
      path: [...this.path],
      aliasedPath: [...this.aliasedPath],
      request: this.request,
      response: this.response,
      environment: this.environment,
    };
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private derive(state: ChainState): Chain {
    return new Chain({
      parent: this,
      state,
      failed: this.ownFailed,
      path: [...this.path],
      aliasedPath: [...this.aliasedPath],
      severity: this.severity,
      handler: this.handler,
      validateFailures: this.validateFailures,
      failCallback: this.failCallback,
      testName: this.testName,
      requestName: this.requestName,
      request: this.request,
      response: this.response,
      environment: this.environment,
    });
  }

  private ensureOpen(operation: string): void {
    if (this.closed) {
      throw new UsageError(`${operation}() called after leave()`);
    }
  }

  private isReportingPoint(): boolean {
    return this.isRoot || this.parent === null || this.parent.state !== 'entered';
  }

  private markAncestors(): void {
    let ancestor = this.isRoot ? null : this.parent;
    while (ancestor) {
      ancestor.failedChildren = true;
      ancestor = ancestor.isRoot ? null : ancestor.parent;
    }
  }

  private reportPending(): void {
    if (!this.pending) return;

    const { context, failure } = this.pending;
    this.pending = undefined;
    this.handler.failure(context, failure);
  }
}

function formatSegment(name: string, args: unknown[]): string {
  return args.length > 0 ? format(name, ...args) : name;
}
