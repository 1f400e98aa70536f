/**
 * Capability Guard
 *
 * Decorates any LanguageModelCapability with the two policies the pipeline
 * applies at the LLM boundary:
 * - an optional per-call timeout, failing the call with TimeoutError and
 *   aborting the abandoned attempt through its signal
 * - bounded exponential backoff for transient failures (rate limits, network)
 *
 * Pipeline code never retries on its own; everything above this layer sees
 * either a result or a final taxonomy error.
 */

import { CallOptions, CompletionInputs, LanguageModelCapability } from '../../shared/types';
import { TimeoutError } from '../errors';
import { retry, RetryOptions } from './retry';

export interface CapabilityGuardConfig {
    /** Per-call timeout; undefined means no timeout */
    timeoutMs?: number;
    retry: Partial<RetryOptions>;
}

export const DEFAULT_GUARD_CONFIG: CapabilityGuardConfig = {
    timeoutMs: undefined,
    retry: {},
};

/**
 * Forwards an abort from `signal` to `controller`. Returns the cleanup that
 * detaches the listener once the call has settled.
 */
export function linkAbortSignal(
    controller: AbortController,
    signal: AbortSignal | undefined
): () => void {
    if (!signal) {
        return () => undefined;
    }
    if (signal.aborted) {
        controller.abort();
        return () => undefined;
    }

    const onAbort = (): void => controller.abort();
    signal.addEventListener('abort', onAbort, { once: true });
    return () => signal.removeEventListener('abort', onAbort);
}

/**
 * Races a promise against a timer. On timeout the controller, if given, is
 * aborted so the losing call stops. The timer is always cleared so a
 * settled call leaves nothing pending.
 */
export async function withTimeout<T>(
    promise: Promise<T>,
    timeoutMs: number | undefined,
    label: string,
    controller?: AbortController
): Promise<T> {
    if (timeoutMs === undefined) {
        return promise;
    }

    let timeoutId: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
        timeoutId = setTimeout(() => {
            controller?.abort();
            reject(new TimeoutError(`${label} timed out after ${timeoutMs}ms`));
        }, timeoutMs);
    });

    try {
        return await Promise.race([promise, timeout]);
    } finally {
        clearTimeout(timeoutId);
    }
}

class GuardedCapability implements LanguageModelCapability {
    constructor(
        private readonly inner: LanguageModelCapability,
        private readonly config: CapabilityGuardConfig
    ) {}

    embed(text: string, options: CallOptions = {}): Promise<number[]> {
        return retry(
            () =>
                this.attempt(
                    (signal) => this.inner.embed(text, { ...options, signal }),
                    options.signal,
                    'Embedding'
                ),
            this.config.retry
        );
    }

    complete(prompt: string, inputs: CompletionInputs, options: CallOptions = {}): Promise<string> {
        return retry(
            () =>
                this.attempt(
                    (signal) => this.inner.complete(prompt, inputs, { ...options, signal }),
                    options.signal,
                    'Completion'
                ),
            this.config.retry
        );
    }

    /**
     * One attempt with its own controller, so a timed-out attempt is
     * cancelled without affecting the retry that follows it.
     */
    private async attempt<T>(
        call: (signal: AbortSignal) => Promise<T>,
        callerSignal: AbortSignal | undefined,
        label: string
    ): Promise<T> {
        const controller = new AbortController();
        const unlink = linkAbortSignal(controller, callerSignal);
        try {
            return await withTimeout(
                call(controller.signal),
                this.config.timeoutMs,
                label,
                controller
            );
        } finally {
            unlink();
        }
    }
}

export function guardCapability(
    capability: LanguageModelCapability,
    config: Partial<CapabilityGuardConfig> = {}
): LanguageModelCapability {
    return new GuardedCapability(capability, { ...DEFAULT_GUARD_CONFIG, ...config });
}
