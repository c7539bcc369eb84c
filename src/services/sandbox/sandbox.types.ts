// src/services/sandbox/sandbox.types.ts

import { EventEmitter } from 'events';
import { Readable, Writable } from 'stream';
import { z } from 'zod';
import { Artifact } from '../../models/artifact.model';
import { FailureKind } from '../../models/project.model';
import { ToolDescriptor } from '../tool/tool.types';

export interface SandboxRequest {
    projectId: string;
    invocationId: string;
    descriptor: ToolDescriptor;
    /** Arguments already validated against the descriptor's schema. */
    arguments: Record<string, unknown>;
    /** The project's artifact index: the newest version of each name a tool may read. */
    committed: Readonly<Record<string, number>>;
}

export interface ExecutionFailure {
    kind: FailureKind;
    summary: string;
    /** Tail of the error output, bounded. */
    detailExcerpt: string;
    missingPackage?: string;
}

interface ExecutionResultBase {
    invocationId: string;
    toolName: string;
    stdoutExcerpt: string;
    stderrExcerpt: string;
    durationMs: number;
    attempts: number;
    logDir?: string;
}

export interface SucceededExecution extends ExecutionResultBase {
    status: 'Succeeded';
    summary: string;
    /** One new version per declared write, in declaration order. */
    artifacts: Artifact[];
}

export interface FailedExecution extends ExecutionResultBase {
    status: 'Failed';
    failure: ExecutionFailure;
}

export type ExecutionResult = SucceededExecution | FailedExecution;

/** The slice of a child process the sandbox relies on. */
export interface SandboxProcess extends EventEmitter {
    /** Also the process group id, since the sandbox spawns detached. */
    readonly pid?: number;
    readonly stdin: Writable;
    readonly stdout: Readable;
    readonly stderr: Readable;
    kill(signal?: NodeJS.Signals | number): boolean;
}

export interface SpawnOptions {
    cwd: string;
    env: NodeJS.ProcessEnv;
}

export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => SandboxProcess;

/** Message written to the runner's stdin. */
export interface RunnerRequest {
    protocol: 1;
    invocationId: string;
    tool: { name: string; entry: string };
    arguments: Record<string, unknown>;
    inputs: Array<{ name: string; version: number; path: string; contentHash: string }>;
    workDir: string;
    outputDir: string;
    allowNetwork: boolean;
}

export const RESULT_FILE = 'result.json';

/** Shape of `result.json`, written by the runner into its working directory. */
export const runnerResultSchema = z.discriminatedUnion('status', [
    z.object({
        status: z.literal('ok'),
        summary: z.string().default(''),
        outputs: z
            .array(z.object({ name: z.string(), file: z.string(), kind: z.string().optional() }))
            .default([]),
    }),
    z.object({
        status: z.literal('error'),
        errorType: z.string(),
        message: z.string().default(''),
        missingPackage: z.string().optional(),
        traceback: z.string().optional(),
    }),
]);

export type RunnerResult = z.output<typeof runnerResultSchema>;

export interface ToolExecutor {
    execute(request: SandboxRequest, signal?: AbortSignal): Promise<ExecutionResult>;
}
