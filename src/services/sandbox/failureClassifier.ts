// src/services/sandbox/failureClassifier.ts

import { ExecutionFailure, RunnerResult } from './sandbox.types';

const MISSING_MODULE_PATTERN = /No module named ['"]([A-Za-z0-9_.-]+)['"]/;
const MEMORY_PATTERN = /\bMemoryError\b|\bout of memory\b|Cannot allocate memory/i;

export interface ProcessExit {
    code: number | null;
    signal: NodeJS.Signals | null;
    stderr: string;
    /** Set when the sandbox itself killed the process. */
    killedFor?: 'Timeout' | 'Cancelled' | 'ResourceExhausted';
    spawnError?: Error;
}

export function tail(text: string, maxChars: number): string {
    if (text.length <= maxChars) return text;
    return `…${text.slice(text.length - maxChars + 1)}`;
}

/** Top-level module name, the part an installer can act on. */
export function missingPackageFrom(text: string): string | undefined {
    const match = MISSING_MODULE_PATTERN.exec(text);
    return match ? match[1].split('.')[0] : undefined;
}

/**
 * Maps a finished sandbox run to exactly one failure kind, or `null` when the
 * runner reported success.
 */
export function classifyRun(
    exit: ProcessExit,
    result: RunnerResult | null,
    excerptChars: number,
): ExecutionFailure | null {
    const detailExcerpt = tail(exit.stderr, excerptChars);

    if (exit.killedFor === 'Timeout') {
        return { kind: 'Timeout', summary: 'The tool exceeded its time limit and was stopped.', detailExcerpt };
    }
    if (exit.killedFor === 'Cancelled') {
        return { kind: 'Cancelled', summary: 'The tool run was cancelled.', detailExcerpt };
    }
    if (exit.killedFor === 'ResourceExhausted') {
        return {
            kind: 'ResourceExhausted',
            summary: 'The tool produced more output than the sandbox allows and was stopped.',
            detailExcerpt,
        };
    }
    if (exit.spawnError) {
        return {
            kind: 'RuntimeError',
            summary: `The sandbox runtime could not be started: ${exit.spawnError.message}`,
            detailExcerpt,
        };
    }

    if (result?.status === 'ok') {
        return null;
    }

    if (result?.status === 'error') {
        const detail = tail(result.traceback ?? exit.stderr, excerptChars);
        if (result.errorType === 'ModuleNotFoundError' || result.errorType === 'ImportError') {
            const missingPackage = result.missingPackage ?? missingPackageFrom(result.message);
            return {
                kind: 'DependencyMissing',
                summary: missingPackage
                    ? `The sandbox is missing the package '${missingPackage}'.`
                    : `A dependency could not be imported: ${result.message}`,
                detailExcerpt: detail,
                missingPackage,
            };
        }
        if (result.errorType === 'MemoryError') {
            return { kind: 'ResourceExhausted', summary: 'The tool ran out of memory.', detailExcerpt: detail };
        }
        return {
            kind: 'RuntimeError',
            summary: `${result.errorType}: ${result.message}`.trim(),
            detailExcerpt: detail,
        };
    }

    // No usable result file: fall back to the exit status and stderr.
    if (exit.signal !== null || exit.code === 137) {
        return {
            kind: 'ResourceExhausted',
            summary: `The sandbox process was killed (${exit.signal ?? `exit ${exit.code}`}), most likely by a resource limit.`,
            detailExcerpt,
        };
    }
    const missingPackage = missingPackageFrom(exit.stderr);
    if (missingPackage) {
        return {
            kind: 'DependencyMissing',
            summary: `The sandbox is missing the package '${missingPackage}'.`,
            detailExcerpt,
            missingPackage,
        };
    }
    if (MEMORY_PATTERN.test(exit.stderr)) {
        return { kind: 'ResourceExhausted', summary: 'The tool ran out of memory.', detailExcerpt };
    }
    return {
        kind: 'RuntimeError',
        summary:
            exit.code === 0
                ? 'The tool finished without reporting a result.'
                : `The tool exited with code ${exit.code} without reporting a result.`,
        detailExcerpt,
    };
}
