// src/services/sandbox/ExecutionSandbox.ts

import { spawn } from 'child_process';
import { copyFile, mkdir, readFile, rm, stat } from 'fs/promises';
import path from 'path';
import { BaseService } from '../base/BaseService';
import { ServiceConfig } from '../base/types';
import { SandboxSettings } from '../../config';
import { Artifact } from '../../models/artifact.model';
import { ArtifactStore } from '../artifact/ArtifactStore';
import { ArtifactNotFoundError, errorMessage } from '../../errors';
import { ArtifactWrite } from '../tool/tool.types';
import { classifyRun, ProcessExit, tail } from './failureClassifier';
import {
    ExecutionFailure,
    ExecutionResult,
    RESULT_FILE,
    RunnerRequest,
    RunnerResult,
    runnerResultSchema,
    SandboxProcess,
    SandboxRequest,
    SpawnFn,
    ToolExecutor,
} from './sandbox.types';

export interface ExecutionSandboxConfig extends ServiceConfig {
    settings: SandboxSettings;
    artifactStore: ArtifactStore;
    spawn?: SpawnFn;
    /** Characters kept from stdout/stderr in results. */
    excerptChars?: number;
    /** How long to wait for the pipes to close after the runner has exited. */
    closeGraceMs?: number;
}

const BLOCKED_PROXY = 'http://127.0.0.1:9';
const PASSTHROUGH_ENV = ['PATH', 'HOME', 'LANG', 'LC_ALL', 'SYSTEMROOT'];

const DEFAULT_CLOSE_GRACE_MS = 2_000;

// Detached so the runner leads its own process group and a kill reaches its workers too.
const defaultSpawn: SpawnFn = (command, args, options) =>
    spawn(command, args, { cwd: options.cwd, env: options.env, stdio: ['pipe', 'pipe', 'pipe'], detached: true });

interface AttemptOutcome {
    failure: ExecutionFailure | null;
    summary: string;
    artifacts: Artifact[];
    stdout: string;
    stderr: string;
    logDir?: string;
}

interface StagedInput {
    name: string;
    artifact: Artifact;
}

/**
 * Runs tool implementations in a separate runtime with its own dependency
 * set. Every attempt gets a fresh child process and working directory; all
 * data crosses the boundary by value (stdin JSON in, `result.json` and files
 * out). Never throws: every outcome is an ExecutionResult.
 */
export class ExecutionSandbox extends BaseService implements ToolExecutor {
    private readonly settings: SandboxSettings;
    private readonly artifactStore: ArtifactStore;
    private readonly spawnProcess: SpawnFn;
    private readonly excerptChars: number;
    private readonly closeGraceMs: number;
    private readonly live = new Set<SandboxProcess>();

    constructor(config: ExecutionSandboxConfig) {
        super(config);
        this.settings = config.settings;
        this.artifactStore = config.artifactStore;
        this.spawnProcess = config.spawn ?? defaultSpawn;
        this.excerptChars = config.excerptChars ?? 2000;
        this.closeGraceMs = config.closeGraceMs ?? DEFAULT_CLOSE_GRACE_MS;
    }

    public async execute(request: SandboxRequest, signal?: AbortSignal): Promise<ExecutionResult> {
        const startedAt = Date.now();
        const { invocationId, descriptor } = request;
        this.logger.info('Sandbox execution started', {
            projectId: request.projectId,
            invocationId,
            toolName: descriptor.name,
        });

        let attempts = 0;
        let installTried = false;
        let outcome: AttemptOutcome;

        try {
            for (;;) {
                attempts += 1;
                outcome = await this.runAttempt(request, attempts, signal);

                const missing = outcome.failure?.kind === 'DependencyMissing' ? outcome.failure.missingPackage : undefined;
                if (!missing || installTried) break;

                installTried = true;
                const installed = await this.installPackage(request, missing, signal);
                if (!installed) break;
            }
        } catch (error) {
            outcome = {
                failure: {
                    kind: 'RuntimeError',
                    summary: `The sandbox failed to run the tool: ${errorMessage(error)}`,
                    detailExcerpt: '',
                },
                summary: '',
                artifacts: [],
                stdout: '',
                stderr: '',
            };
            this.logger.error('Sandbox execution raised unexpectedly', { invocationId, error: errorMessage(error) });
        }

        const base = {
            invocationId,
            toolName: descriptor.name,
            stdoutExcerpt: tail(outcome.stdout, this.excerptChars),
            stderrExcerpt: tail(outcome.stderr, this.excerptChars),
            durationMs: Date.now() - startedAt,
            attempts,
            logDir: outcome.logDir,
        };

        if (outcome.failure) {
            this.logger.warn('Sandbox execution failed', {
                invocationId,
                toolName: descriptor.name,
                kind: outcome.failure.kind,
                summary: outcome.failure.summary,
                attempts,
            });
            return { ...base, status: 'Failed', failure: outcome.failure };
        }

        this.logger.info('Sandbox execution succeeded', {
            invocationId,
            toolName: descriptor.name,
            artifacts: outcome.artifacts.map((a) => `${a.name}@v${a.version}`),
            durationMs: base.durationMs,
        });
        return { ...base, status: 'Succeeded', summary: outcome.summary, artifacts: outcome.artifacts };
    }

    /** Kills every live sandbox process and removes all working directories. */
    public async reset(): Promise<void> {
        for (const child of this.live) {
            killProcessTree(child);
        }
        this.live.clear();
        await rm(this.settings.root, { recursive: true, force: true });
        await mkdir(this.settings.root, { recursive: true });
        this.logger.info('Sandbox reset', { root: this.settings.root });
    }

    public activeProcessCount(): number {
        return this.live.size;
    }

    private async runAttempt(request: SandboxRequest, attempt: number, signal?: AbortSignal): Promise<AttemptOutcome> {
        const { projectId, invocationId, descriptor } = request;

        if (signal?.aborted) {
            return failedBeforeStart('Cancelled', 'The tool run was cancelled before it started.');
        }

        let inputs: StagedInput[];
        try {
            inputs = await this.resolveInputs(request);
        } catch (error) {
            if (error instanceof ArtifactNotFoundError) {
                return failedBeforeStart(
                    'RuntimeError',
                    `Required input artifact '${error.artifactName}'` +
                        (error.version === undefined ? ' does not exist yet.' : ` version ${error.version} does not exist.`),
                );
            }
            throw error;
        }

        const workDir = path.join(this.settings.root, projectId, `${invocationId}-a${attempt}`);
        const inputDir = path.join(workDir, 'inputs');
        const outputDir = path.join(workDir, 'outputs');

        try {
            await mkdir(inputDir, { recursive: true });
            await mkdir(outputDir, { recursive: true });

            const runnerInputs: RunnerRequest['inputs'] = [];
            for (const { name, artifact } of inputs) {
                const target = path.join(inputDir, `${name}${path.extname(artifact.location)}`);
                await copyFile(artifact.location, target);
                runnerInputs.push({ name, version: artifact.version, path: target, contentHash: artifact.contentHash });
            }

            const allowNetwork = descriptor.sideEffects.network;
            const message: RunnerRequest = {
                protocol: 1,
                invocationId,
                tool: { name: descriptor.name, entry: descriptor.implementation.entry },
                arguments: request.arguments,
                inputs: runnerInputs,
                workDir,
                outputDir,
                allowNetwork,
            };

            const { command, args } = this.commandFor(this.settings.args, allowNetwork);
            const exit = await this.runProcess(command, args, {
                cwd: workDir,
                env: this.environmentFor(workDir, allowNetwork),
                stdin: JSON.stringify(message),
                timeoutMs: descriptor.implementation.timeoutMs ?? this.settings.defaultTimeoutMs,
                signal,
            });

            const logDir = await this.artifactStore.attachLogs(projectId, `${invocationId}-a${attempt}`, {
                stdout: exit.stdout,
                stderr: exit.stderr,
            });

            const result = exit.killedFor || exit.spawnError ? null : await readRunnerResult(workDir);
            const failure = classifyRun(exit, result, this.excerptChars);
            if (failure || result?.status !== 'ok') {
                return {
                    failure: failure ?? { kind: 'RuntimeError', summary: 'Unreadable tool result.', detailExcerpt: '' },
                    summary: '',
                    artifacts: [],
                    stdout: exit.stdout,
                    stderr: exit.stderr,
                    logDir,
                };
            }

            const collected = await this.collectOutputs(request, result, outputDir);
            return { ...collected, stdout: exit.stdout, stderr: exit.stderr, logDir };
        } finally {
            await rm(workDir, { recursive: true, force: true });
        }
    }

    /** Only committed versions are visible; "latest" is the committed one, not the newest stored. */
    private async resolveInputs(request: SandboxRequest): Promise<StagedInput[]> {
        const { projectId, committed } = request;
        const staged: StagedInput[] = [];
        for (const name of request.descriptor.sideEffects.reads) {
            const latest = committed[name];
            if (latest === undefined) throw new ArtifactNotFoundError(projectId, name);
            const spec = parseVersionSpec(request.arguments[name]);
            const version = spec === 'latest' ? latest : spec;
            if (version > latest) throw new ArtifactNotFoundError(projectId, name, version);
            staged.push({ name, artifact: await this.artifactStore.getByVersion(projectId, name, version) });
        }
        return staged;
    }

    /**
     * Stores exactly one new version per declared write. A declared output the
     * runner did not report fails the run before anything is stored.
     */
    private async collectOutputs(
        request: SandboxRequest,
        result: Extract<RunnerResult, { status: 'ok' }>,
        outputDir: string,
    ): Promise<Omit<AttemptOutcome, 'stdout' | 'stderr' | 'logDir'>> {
        const files: Array<{ write: ArtifactWrite; file: string }> = [];
        const missing: string[] = [];

        for (const write of request.descriptor.sideEffects.writes) {
            const reported = result.outputs.find((o) => o.name === write.name);
            const file = reported ? path.resolve(outputDir, reported.file) : null;
            if (!file || !file.startsWith(outputDir + path.sep) || !(await isFile(file))) {
                missing.push(write.name);
                continue;
            }
            files.push({ write, file });
        }

        if (missing.length > 0) {
            return {
                failure: {
                    kind: 'RuntimeError',
                    summary: `The tool did not produce its declared output(s): ${missing.join(', ')}.`,
                    detailExcerpt: '',
                },
                summary: '',
                artifacts: [],
            };
        }

        const artifacts: Artifact[] = [];
        for (const { write, file } of files) {
            try {
                artifacts.push(
                    await this.artifactStore.create(request.projectId, write.name, {
                        kind: write.kind,
                        producedBy: request.invocationId,
                        source: { path: file },
                    }),
                );
            } catch (error) {
                return {
                    failure: {
                        kind: 'RuntimeError',
                        summary: `Output '${write.name}' could not be stored: ${errorMessage(error)}`,
                        detailExcerpt: '',
                    },
                    summary: '',
                    artifacts,
                };
            }
        }
        return { failure: null, summary: result.summary, artifacts };
    }

    private async installPackage(request: SandboxRequest, missing: string, signal?: AbortSignal): Promise<boolean> {
        const declared = request.descriptor.implementation.packages;
        const normalise = (name: string) => name.toLowerCase().replace(/[-_.]/g, '');
        const target = declared.find((p) => normalise(p) === normalise(missing)) ?? missing;

        const workDir = path.join(this.settings.root, request.projectId, `${request.invocationId}-install`);
        this.logger.warn('Installing missing sandbox dependency', {
            invocationId: request.invocationId,
            missing,
            package: target,
            declared: declared.includes(target),
        });

        try {
            await mkdir(workDir, { recursive: true });
            const exit = await this.runProcess(this.settings.command, [...this.settings.installArgs, target], {
                cwd: workDir,
                env: this.environmentFor(workDir, true),
                stdin: '',
                timeoutMs: this.settings.defaultTimeoutMs,
                signal,
            });
            await this.artifactStore.attachLogs(request.projectId, `${request.invocationId}-install`, {
                stdout: exit.stdout,
                stderr: exit.stderr,
            });
            const ok = exit.code === 0 && !exit.killedFor && !exit.spawnError;
            this.logger.info('Sandbox dependency install finished', { package: target, ok, code: exit.code });
            return ok;
        } finally {
            await rm(workDir, { recursive: true, force: true });
        }
    }

    private commandFor(runnerArgs: string[], allowNetwork: boolean): { command: string; args: string[] } {
        const wrapper = this.settings.denyNetworkWrapper;
        if (allowNetwork || wrapper.length === 0) {
            return { command: this.settings.command, args: [...runnerArgs] };
        }
        return { command: wrapper[0], args: [...wrapper.slice(1), this.settings.command, ...runnerArgs] };
    }

    /** Minimal environment: the orchestrator's own variables (and secrets) stay out. */
    private environmentFor(workDir: string, allowNetwork: boolean): NodeJS.ProcessEnv {
        const env: NodeJS.ProcessEnv = { PIPELINE_SANDBOX: '1', TMPDIR: workDir };
        for (const key of PASSTHROUGH_ENV) {
            const value = process.env[key];
            if (value !== undefined) env[key] = value;
        }
        if (!allowNetwork) {
            env.HTTP_PROXY = env.HTTPS_PROXY = env.http_proxy = env.https_proxy = BLOCKED_PROXY;
            env.NO_PROXY = env.no_proxy = '';
        }
        return env;
    }

    private runProcess(
        command: string,
        args: string[],
        options: { cwd: string; env: NodeJS.ProcessEnv; stdin: string; timeoutMs: number; signal?: AbortSignal },
    ): Promise<ProcessExit & { stdout: string }> {
        return new Promise((resolve) => {
            let stdout = '';
            let stderr = '';
            let outputBytes = 0;
            let killedFor: ProcessExit['killedFor'];
            let settled = false;
            let closeGrace: NodeJS.Timeout | undefined;

            let child: SandboxProcess;
            try {
                child = this.spawnProcess(command, args, { cwd: options.cwd, env: options.env });
            } catch (error) {
                resolve({
                    code: null,
                    signal: null,
                    stdout,
                    stderr,
                    spawnError: error instanceof Error ? error : new Error(String(error)),
                });
                return;
            }
            this.live.add(child);

            const stop = (reason: NonNullable<ProcessExit['killedFor']>) => {
                if (killedFor) return;
                killedFor = reason;
                killProcessTree(child);
            };

            const timer = setTimeout(() => stop('Timeout'), options.timeoutMs);
            const onAbort = () => stop('Cancelled');
            options.signal?.addEventListener('abort', onAbort, { once: true });

            const finish = (exit: ProcessExit) => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                clearTimeout(closeGrace);
                options.signal?.removeEventListener('abort', onAbort);
                this.live.delete(child);
                child.stdout.destroy();
                child.stderr.destroy();
                resolve({ ...exit, stdout });
            };

            const capture = (chunk: Buffer | string, into: 'stdout' | 'stderr') => {
                outputBytes += Buffer.byteLength(chunk);
                if (outputBytes > this.settings.maxOutputBytes) {
                    stop('ResourceExhausted');
                    return;
                }
                if (into === 'stdout') stdout += chunk.toString();
                else stderr += chunk.toString();
            };

            child.stdout.on('data', (chunk: Buffer | string) => capture(chunk, 'stdout'));
            child.stderr.on('data', (chunk: Buffer | string) => capture(chunk, 'stderr'));
            child.stdin.on('error', (error: Error) => {
                this.logger.debug('Sandbox stdin closed early', { error: error.message });
            });

            child.once('error', (error: Error) => {
                finish({ code: null, signal: null, stderr, killedFor, spawnError: killedFor ? undefined : error });
            });
            // Workers the runner left behind can hold the pipes open after it exits.
            child.once('exit', (code: number | null, signal: NodeJS.Signals | null) => {
                if (killedFor) {
                    finish({ code, signal, stderr, killedFor });
                    return;
                }
                closeGrace = setTimeout(() => {
                    killProcessTree(child);
                    finish({ code, signal, stderr, killedFor });
                }, this.closeGraceMs);
            });
            child.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
                finish({ code, signal, stderr, killedFor });
            });

            if (options.signal?.aborted) {
                stop('Cancelled');
            }
            child.stdin.end(options.stdin);
        });
    }
}

function killProcessTree(child: SandboxProcess): void {
    if (child.pid !== undefined && process.platform !== 'win32' && signalGroup(child.pid)) return;
    child.kill('SIGKILL');
}

function signalGroup(pid: number): boolean {
    try {
        process.kill(-pid, 'SIGKILL');
        return true;
    } catch {
        return false;
    }
}

/**
 * Accepts `"latest"`, `"v3"`, `"3"` or `3`; anything else means latest.
 */
export function parseVersionSpec(value: unknown): number | 'latest' {
    if (typeof value === 'number' && Number.isInteger(value) && value > 0) return value;
    if (typeof value === 'string') {
        const match = /^v?(\d+)$/i.exec(value.trim());
        if (match) {
            const version = Number(match[1]);
            if (version > 0) return version;
        }
    }
    return 'latest';
}

async function readRunnerResult(workDir: string): Promise<RunnerResult | null> {
    let raw: string;
    try {
        raw = await readFile(path.join(workDir, RESULT_FILE), 'utf-8');
    } catch {
        return null;
    }
    try {
        const parsed = runnerResultSchema.safeParse(JSON.parse(raw));
        return parsed.success ? parsed.data : null;
    } catch {
        return null;
    }
}

async function isFile(filePath: string): Promise<boolean> {
    try {
        return (await stat(filePath)).isFile();
    } catch {
        return false;
    }
}

function failedBeforeStart(kind: ExecutionFailure['kind'], summary: string): AttemptOutcome {
    return { failure: { kind, summary, detailExcerpt: '' }, summary: '', artifacts: [], stdout: '', stderr: '' };
}
