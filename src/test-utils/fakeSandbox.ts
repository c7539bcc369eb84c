// src/test-utils/fakeSandbox.ts

import { EventEmitter } from 'events';
import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { PassThrough } from 'stream';
import { RESULT_FILE, RunnerRequest, RunnerResult, SandboxProcess, SpawnFn } from '../services/sandbox/sandbox.types';

export interface FakeProcessOptions {
    /**
     * The process exits without its pipes ever closing, as when forked workers
     * inherited them and outlive it.
     */
    pipesHeldOpen?: boolean;
}

export class FakeProcess extends EventEmitter implements SandboxProcess {
    readonly stdin = new PassThrough();
    readonly stdout = new PassThrough();
    readonly stderr = new PassThrough();
    killedWith: NodeJS.Signals | number | undefined;
    private exited = false;
    private closed = false;

    constructor(private readonly options: FakeProcessOptions = {}) {
        super();
    }

    kill(signal: NodeJS.Signals | number = 'SIGTERM'): boolean {
        if (this.exited) return false;
        this.killedWith = signal;
        setImmediate(() => this.finish(null, typeof signal === 'string' ? signal : 'SIGKILL'));
        return true;
    }

    /** Exits, then closes the pipes unless they are held open. */
    finish(code: number | null, signal: NodeJS.Signals | null): void {
        if (this.options.pipesHeldOpen) this.exit(code, signal);
        else this.close(code, signal);
    }

    exit(code: number | null, signal: NodeJS.Signals | null): void {
        if (this.exited) return;
        this.exited = true;
        this.emit('exit', code, signal);
    }

    close(code: number | null, signal: NodeJS.Signals | null): void {
        if (this.closed) return;
        this.exit(code, signal);
        this.closed = true;
        this.stdout.end();
        this.stderr.end();
        this.emit('close', code, signal);
    }
}

export interface SpawnCall {
    command: string;
    args: string[];
    cwd: string;
    env: NodeJS.ProcessEnv;
    stdin: string;
    request: RunnerRequest | null;
}

/** Exit code to close with, or `hang` to wait until the sandbox kills the process. */
export type FakeBehaviour = (call: SpawnCall, proc: FakeProcess) => Promise<number | 'hang'> | number | 'hang';

function parseRequest(text: string): RunnerRequest | null {
    if (!text) return null;
    const request: RunnerRequest = JSON.parse(text);
    return request;
}

export function createFakeSpawn(
    behaviour: FakeBehaviour,
    processOptions: FakeProcessOptions = {},
): { spawn: SpawnFn; calls: SpawnCall[] } {
    const calls: SpawnCall[] = [];
    const spawn: SpawnFn = (command, args, options) => {
        const proc = new FakeProcess(processOptions);
        let input = '';
        proc.stdin.on('data', (chunk: Buffer) => {
            input += chunk.toString();
        });
        proc.stdin.on('end', () => {
            const call: SpawnCall = { command, args, cwd: options.cwd, env: options.env, stdin: input, request: parseRequest(input) };
            calls.push(call);
            Promise.resolve()
                .then(() => behaviour(call, proc))
                .then(
                    (outcome) => {
                        if (outcome !== 'hang') setImmediate(() => proc.finish(outcome, null));
                    },
                    (error: unknown) => {
                        proc.stderr.write(String(error));
                        setImmediate(() => proc.finish(1, null));
                    },
                );
        });
        return proc;
    };
    return { spawn, calls };
}

export async function writeRunnerResult(call: SpawnCall, result: RunnerResult): Promise<void> {
    await writeFile(path.join(call.cwd, RESULT_FILE), JSON.stringify(result));
}

export async function writeRunnerOutput(call: SpawnCall, file: string, content: string): Promise<void> {
    if (!call.request) throw new Error('no runner request on this call');
    await mkdir(call.request.outputDir, { recursive: true });
    await writeFile(path.join(call.request.outputDir, file), content);
}
