/**
 * UsageTracker - declared/used bookkeeping for one analysis scope
 *
 * Two strategies share the classifier and the record type:
 *
 * - WholeProgramUsageTracker (fields): fed by every source unit of the run,
 *   possibly interleaved. finalize() is a barrier: it is rejected while any
 *   producer handle is still open.
 * - SingleBodyUsageTracker (parameters, locals): one instance per callable,
 *   finalized as soon as the callable's body has been walked.
 *
 * Every mutation is an insert-or-update with commutative semantics
 * (first-writer-wins declaration, boolean OR usage), so event order between
 * producers never changes the result.
 *
 * Usage:
 *   const tracker = new WholeProgramUsageTracker(registry);
 *   const producer = tracker.openProducer('src/a.ts');
 *   const id = tracker.declare(input);
 *   tracker.recordAccess(id, { kind: 'assignment-left-simple' });
 *   producer.close();
 *   const unused = tracker.finalize();
 */

import {
  compareDeclarations,
  type AccessContext,
  type Declaration,
  type DeclarationId,
  type DeclarationInput,
  type UsageRecord,
} from '@unread/types';
import { mergeAccess } from './AccessClassifier.js';
import { DeclarationRegistry } from './DeclarationRegistry.js';
import { BarrierViolationError } from '../errors/UnreadError.js';

/**
 * Counters for malformed input and throughput.
 * Nothing here is surfaced as an error; it feeds debug logging.
 */
export interface UsageTrackerStats {
  declared: number;
  recordedAccesses: number;
  /** recordAccess() for an id this tracker never declared */
  droppedOccurrences: number;
  /** declare() of a known binding with the same kind */
  duplicateDeclarations: number;
  /** declare() of a known binding with a different kind (ignored) */
  conflictingDeclarations: number;
}

export function emptyTrackerStats(): UsageTrackerStats {
  return {
    declared: 0,
    recordedAccesses: 0,
    droppedOccurrences: 0,
    duplicateDeclarations: 0,
    conflictingDeclarations: 0,
  };
}

export function addTrackerStats(into: UsageTrackerStats, from: UsageTrackerStats): UsageTrackerStats {
  into.declared += from.declared;
  into.recordedAccesses += from.recordedAccesses;
  into.droppedOccurrences += from.droppedOccurrences;
  into.duplicateDeclarations += from.duplicateDeclarations;
  into.conflictingDeclarations += from.conflictingDeclarations;
  return into;
}

export abstract class UsageTracker {
  protected readonly registry: DeclarationRegistry;
  private readonly declared = new Map<DeclarationId, Declaration>();
  private readonly used = new Map<DeclarationId, UsageRecord>();
  protected readonly stats: UsageTrackerStats = emptyTrackerStats();

  constructor(registry: DeclarationRegistry = new DeclarationRegistry()) {
    this.registry = registry;
  }

  /**
   * Register a binding. Idempotent: the same key always yields the same id.
   */
  declare(input: DeclarationInput): DeclarationId {
    this.assertOpen('declare');

    const { declaration, created } = this.registry.intern(input);
    if (!created && declaration.kind !== input.kind) {
      this.stats.conflictingDeclarations++;
      return declaration.id;
    }

    if (this.declared.has(declaration.id)) {
      this.stats.duplicateDeclarations++;
      return declaration.id;
    }

    this.declared.set(declaration.id, declaration);
    this.stats.declared++;
    return declaration.id;
  }

  /**
   * Classify the occurrence and OR its role into the declaration's record.
   * Unknown ids are dropped (counted, not thrown).
   */
  recordAccess(declarationId: DeclarationId, context: AccessContext): void {
    this.assertOpen('recordAccess');

    if (!this.declared.has(declarationId)) {
      this.stats.droppedOccurrences++;
      return;
    }

    this.used.set(declarationId, mergeAccess(this.used.get(declarationId), context));
    this.stats.recordedAccesses++;
  }

  isDeclared(declarationId: DeclarationId): boolean {
    return this.declared.has(declarationId);
  }

  getRecord(declarationId: DeclarationId): UsageRecord | undefined {
    const record = this.used.get(declarationId);
    return record ? { ...record } : undefined;
  }

  getStats(): UsageTrackerStats {
    return { ...this.stats };
  }

  /**
   * Declarations without a recorded read, in file/line/column/id order.
   */
  finalize(): Declaration[] {
    this.beforeFinalize();
    return this.sweep();
  }

  protected sweep(): Declaration[] {
    const unused: Declaration[] = [];
    for (const [id, declaration] of this.declared) {
      if (!this.used.get(id)?.hasRead) {
        unused.push(declaration);
      }
    }
    return unused.sort(compareDeclarations);
  }

  /** Hook for strategies that guard finalize() */
  protected abstract beforeFinalize(): void;

  /** Hook for strategies that reject events after finalize() */
  protected abstract assertOpen(operation: string): void;
}

/**
 * Handle held by one source unit while it feeds a whole-program tracker.
 */
export interface ProducerHandle {
  readonly unitId: string;
  close(): void;
}

export class WholeProgramUsageTracker extends UsageTracker {
  private readonly openProducers = new Map<number, string>();
  private nextProducer = 0;
  private finalized = false;

  /**
   * Announce a producer. finalize() is rejected until every handle is closed.
   * close() is idempotent.
   */
  openProducer(unitId: string): ProducerHandle {
    this.assertOpen('openProducer');
    const token = this.nextProducer++;
    this.openProducers.set(token, unitId);

    return {
      unitId,
      close: () => {
        this.openProducers.delete(token);
      },
    };
  }

  get pendingProducers(): string[] {
    return [...this.openProducers.values()];
  }

  get isFinalized(): boolean {
    return this.finalized;
  }

  protected beforeFinalize(): void {
    if (this.finalized) {
      throw new BarrierViolationError(
        'finalize() was already called on this tracker',
        'ERR_FINALIZE_TWICE'
      );
    }

    if (this.openProducers.size > 0) {
      const pending = this.pendingProducers;
      throw new BarrierViolationError(
        `finalize() called while ${pending.length} producer(s) are still running`,
        'ERR_FINALIZE_BEFORE_BARRIER',
        { pending },
        'Close every producer handle before finalizing'
      );
    }

    this.finalized = true;
  }

  protected assertOpen(operation: string): void {
    if (this.finalized) {
      throw new BarrierViolationError(
        `${operation}() called after finalize()`,
        'ERR_EVENT_AFTER_FINALIZE',
        { operation }
      );
    }
  }
}

/**
 * Tracker confined to one callable. No barrier: the owner walks the body,
 * then finalizes. finalize() is a pure sweep and may be repeated.
 */
export class SingleBodyUsageTracker extends UsageTracker {
  readonly owner: string;

  constructor(owner: string, registry?: DeclarationRegistry) {
    super(registry);
    this.owner = owner;
  }

  protected beforeFinalize(): void {}

  protected assertOpen(): void {}
}
