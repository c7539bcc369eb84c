// src/services/provider/retry.ts

import { APIConnectionError as GroqConnectionError } from 'groq-sdk';
import { APIConnectionError as OpenAIConnectionError } from 'openai';
import { RetrySettings } from '../../config';

const TRANSIENT_STATUS = new Set([408, 409, 429]);

export interface FailureClass {
    transient: boolean;
    status?: number;
}

export function classifyProviderFailure(error: unknown): FailureClass {
    if (error instanceof GroqConnectionError || error instanceof OpenAIConnectionError) {
        return { transient: true };
    }
    if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
        const status = error.status;
        return { transient: TRANSIENT_STATUS.has(status) || status >= 500, status };
    }
    return { transient: false };
}

/** `baseDelayMs * 2^retry`, capped. */
export function backoffDelay(retry: number, settings: RetrySettings): number {
    return Math.min(settings.baseDelayMs * 2 ** retry, settings.maxDelayMs);
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Resolves after `ms`, or early once the signal aborts. */
export const sleep: SleepFn = (ms, signal) =>
    new Promise((resolve) => {
        if (signal?.aborted) {
            resolve();
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            resolve();
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
