/**
 * Scratch Card State Machine
 * Single source of truth for the current card.
 *
 * UNSCRATCHED --scratch--> SCRATCHED --activate--> ACTIVATED
 *
 * Scratch is legal from any state and replaces the card. A cancelled scratch
 * leaves the card alone and is only visible in history as CANCELLED.
 */
import { batch, createSignal } from 'solid-js';
import { v4 as uuidv4 } from 'uuid';
import type { Card, CardSnapshot } from '../types.js';
import {
  ActivationError,
  AlreadyActivatedError,
  MissingCodeError,
  TransportError,
} from '../errors.js';
import { decideActivation, type ActivationVerifier } from '../services/activation.js';
import { createHistoryLedger, type HistoryLedger } from './history.js';

export const SCRATCH_DELAY_MS = 2000;

export interface ScratchCardStoreOptions {
  verifier: ActivationVerifier;
  ledger?: HistoryLedger;
  scratchDelayMs?: number;
  generateCode?: () => string;
  now?: () => number;
}

export type ScratchStatus = 'pending' | 'scratched' | 'cancelled';

export type ScratchOutcome =
  | { status: 'scratched'; card: Card }
  | { status: 'cancelled' };

export interface ScratchHandle {
  readonly status: ScratchStatus;
  /** Returns false once the scratch has already settled */
  cancel(): boolean;
  readonly done: Promise<ScratchOutcome>;
}

export type ActivationOutcome =
  | { status: 'activated'; card: Card }
  | { status: 'failed'; error: ActivationError }
  | { status: 'discarded' };

// One verification shared by every caller that joined it
function createActivationRequest() {
  const controller = new AbortController();
  const callers = new Set<AbortSignal>();
  // A caller without a signal never goes away
  let anchored = false;

  const abandoned = () => !anchored && [...callers].every(signal => signal.aborted);
  const onCallerAbort = () => {
    if (abandoned()) controller.abort();
  };

  return {
    signal: controller.signal,
    abandoned,
    join(signal?: AbortSignal) {
      if (!signal) {
        anchored = true;
      } else if (!signal.aborted) {
        callers.add(signal);
        signal.addEventListener('abort', onCallerAbort, { once: true });
      }
      onCallerAbort();
    },
    abort() {
      controller.abort();
    },
    release() {
      for (const signal of callers) signal.removeEventListener('abort', onCallerAbort);
    }
  };
}

type ActivationRequest = ReturnType<typeof createActivationRequest>;

export function createScratchCardStore(options: ScratchCardStoreOptions) {
  const ledger = options.ledger ?? createHistoryLedger();
  const delayMs = options.scratchDelayMs ?? SCRATCH_DELAY_MS;
  const generateCode = options.generateCode ?? (() => uuidv4());
  const now = options.now ?? Date.now;
  const { verifier } = options;

  const initialCard: Card = { code: null, state: 'UNSCRATCHED', timestamp: now() };
  const [card, writeCard] = createSignal<Card>(Object.freeze(initialCard));
  const [error, writeError] = createSignal<string | null>(null);
  const [loading, writeLoading] = createSignal(false);
  const [pendingScratch, writePendingScratch] = createSignal<ScratchHandle | null>(null);
  const disposeController = new AbortController();
  const listeners = new Set<(snapshot: CardSnapshot) => void>();
  let inFlight: { request: ActivationRequest; attempt: Promise<ActivationOutcome> } | null = null;
  let depth = 0;
  let dirty = false;

  // Derived state
  const scratching = () => pendingScratch() !== null;
  const history = () => ledger.entriesMostRecentFirst();

  function snapshot(): CardSnapshot {
    return {
      card: card(),
      history: history(),
      error: error(),
      loading: loading(),
      scratching: scratching()
    };
  }

  // ==========================================================================
  // CHANGE NOTIFICATION
  // ==========================================================================

  function flush() {
    if (depth > 0 || !dirty) return;
    dirty = false;
    const current = snapshot();
    for (const listener of [...listeners]) {
      try {
        listener(current);
      } catch (err) {
        console.error('[Store] Listener failed:', err);
      }
    }
  }

  function changed() {
    dirty = true;
    flush();
  }

  // Listeners see one snapshot once the outermost update returns
  function update<T>(fn: () => T): T {
    depth++;
    try {
      return batch(fn);
    } finally {
      depth--;
      flush();
    }
  }

  function setCard(next: Card) {
    writeCard(next);
    changed();
  }

  function setError(message: string | null) {
    if (error() === message) return;
    writeError(message);
    changed();
  }

  function setLoading(value: boolean) {
    if (loading() === value) return;
    writeLoading(value);
    changed();
  }

  function setPendingScratch(handle: ScratchHandle | null) {
    if (pendingScratch() === handle) return;
    writePendingScratch(handle);
    changed();
  }

  const stopLedger = ledger.subscribe(changed);

  // Replace the card and record the transition in one update
  function commit(next: Card): Card {
    const frozen = Object.freeze({ ...next });
    update(() => {
      setCard(frozen);
      ledger.append({ code: frozen.code, state: frozen.state, timestamp: frozen.timestamp });
    });
    return frozen;
  }

  // ==========================================================================
  // SCRATCH
  // ==========================================================================

  function scratch(signal?: AbortSignal): ScratchHandle {
    if (disposeController.signal.aborted) {
      throw new Error('Scratch card store has been disposed');
    }
    return update(() => startScratch(signal));
  }

  function startScratch(signal?: AbortSignal): ScratchHandle {
    // Only one reveal at a time; a new one supersedes the pending one
    pendingScratch()?.cancel();

    const controller = new AbortController();
    let status: ScratchStatus = 'pending';
    let resolveDone: (outcome: ScratchOutcome) => void = () => {};
    const done = new Promise<ScratchOutcome>(resolve => {
      resolveDone = resolve;
    });

    const handle: ScratchHandle = {
      get status() {
        return status;
      },
      cancel() {
        if (status !== 'pending') return false;
        controller.abort();
        return true;
      },
      done
    };

    const onCallerAbort = () => {
      handle.cancel();
    };

    // Whichever of timer or abort runs first settles the handle; the other is a no-op
    function settle(next: ScratchStatus, apply: () => ScratchOutcome) {
      status = next;
      clearTimeout(timer);
      signal?.removeEventListener('abort', onCallerAbort);
      const outcome = update(() => {
        const result = apply();
        if (pendingScratch() === handle) setPendingScratch(null);
        return result;
      });
      resolveDone(outcome);
    }

    const timer = setTimeout(() => {
      if (status !== 'pending') return;
      settle('scratched', () => {
        const scratched = commit({ code: generateCode(), state: 'SCRATCHED', timestamp: now() });
        console.log(`[Scratch] Card scratched: ${scratched.code}`);
        return { status: 'scratched', card: scratched };
      });
    }, delayMs);

    controller.signal.addEventListener('abort', () => {
      if (status !== 'pending') return;
      settle('cancelled', () => {
        ledger.append({ code: null, state: 'CANCELLED', timestamp: now() });
        console.log('[Scratch] Scratch cancelled');
        return { status: 'cancelled' };
      });
    }, { once: true });

    setPendingScratch(handle);

    if (signal?.aborted) {
      handle.cancel();
    } else {
      signal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    return handle;
  }

  function cancelScratch(): boolean {
    return pendingScratch()?.cancel() ?? false;
  }

  // ==========================================================================
  // ACTIVATION
  // ==========================================================================

  function fail(err: ActivationError): ActivationOutcome {
    console.warn(`[Activation] ${err.name}: ${err.message}`);
    setError(err.message);
    return { status: 'failed', error: err };
  }

  async function runActivation(current: Card, code: string, request: ActivationRequest): Promise<ActivationOutcome> {
    const abortRequest = () => request.abort();
    disposeController.signal.addEventListener('abort', abortRequest, { once: true });

    // Every caller went away, or the card was replaced while waiting
    const isStale = () =>
      request.abandoned() || disposeController.signal.aborted || card() !== current;

    setLoading(true);
    try {
      const result = await verifier.verify(code, request.signal);
      if (isStale()) {
        console.warn(`[Activation] Discarding result for ${code}`);
        return { status: 'discarded' };
      }

      const decision = result.ok ? decideActivation(result.value) : result;
      if (!decision.ok) {
        return fail(decision.error);
      }

      const activated = update(() => {
        const next = commit({ code, state: 'ACTIVATED', timestamp: now() });
        setError(null);
        return next;
      });
      console.log(`[Activation] Card activated: ${code} (version ${decision.version})`);
      return { status: 'activated', card: activated };
    } catch (err) {
      if (isStale()) {
        console.warn(`[Activation] Discarding failure for ${code}`);
        return { status: 'discarded' };
      }
      const message = err instanceof Error ? err.message : String(err);
      return fail(new TransportError(`Activation request failed: ${message}`, { cause: err }));
    } finally {
      setLoading(false);
      request.release();
      disposeController.signal.removeEventListener('abort', abortRequest);
    }
  }

  // A caller whose own signal aborted never sees the result
  function outcomeFor(attempt: Promise<ActivationOutcome>, signal?: AbortSignal): Promise<ActivationOutcome> {
    return attempt.then((outcome): ActivationOutcome => (signal?.aborted ? { status: 'discarded' } : outcome));
  }

  /**
   * Verify the current code and activate the card.
   * Failures are surfaced through error() and returned, never thrown.
   * A call made while a verification is pending joins that verification;
   * the request is aborted only once every joined caller has aborted.
   */
  function activate(signal?: AbortSignal): Promise<ActivationOutcome> {
    if (inFlight) {
      inFlight.request.join(signal);
      return outcomeFor(inFlight.attempt, signal);
    }
    if (disposeController.signal.aborted) {
      return Promise.resolve<ActivationOutcome>({ status: 'discarded' });
    }

    const current = card();
    if (!current.code) {
      return Promise.resolve(fail(new MissingCodeError()));
    }
    if (current.state === 'ACTIVATED') {
      return Promise.resolve(fail(new AlreadyActivatedError(current.code)));
    }

    const code = current.code;
    const request = createActivationRequest();
    request.join(signal);
    // Listeners hear about loading only once the attempt is joinable
    return update(() => {
      const attempt = runActivation(current, code, request).finally(() => {
        inFlight = null;
      });
      inFlight = { request, attempt };
      return outcomeFor(attempt, signal);
    });
  }

  function clearError() {
    setError(null);
  }

  // ==========================================================================
  // OBSERVATION & TEARDOWN
  // ==========================================================================

  function subscribe(listener: (snapshot: CardSnapshot) => void): () => void {
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  }

  function dispose() {
    if (disposeController.signal.aborted) return;
    cancelScratch();
    disposeController.abort();
    stopLedger();
    listeners.clear();
  }

  return {
    // State accessors
    card,
    history,
    error,
    loading,
    scratching,
    snapshot,

    // Actions
    scratch,
    cancelScratch,
    activate,
    clearError,
    subscribe,
    dispose
  };
}

export type ScratchCardStore = ReturnType<typeof createScratchCardStore>;
