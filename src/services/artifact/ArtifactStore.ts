// src/services/artifact/ArtifactStore.ts

import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import { copyFile, mkdir, readFile, rename, rm, stat, writeFile } from 'fs/promises';
import path from 'path';
import { lock } from 'proper-lockfile';
import { z } from 'zod';
import { BaseService } from '../base/BaseService';
import { ServiceConfig } from '../base/types';
import { Artifact, ArtifactKind } from '../../models/artifact.model';
import { ArtifactNotFoundError } from '../../errors';
import { ModelCallLog, ModelCallRecord } from '../provider/provider.types';

export interface ArtifactStoreConfig extends ServiceConfig {
    root: string;
}

export type ArtifactSource = { path: string } | { content: Buffer | string };

export interface CreateArtifactInput {
    kind: ArtifactKind;
    producedBy: string;
    source: ArtifactSource;
    /** File name inside the version directory; defaults to the source's base name. */
    fileName?: string;
}

export interface InvocationLogs {
    stdout: string;
    stderr: string;
}

const SAFE_SEGMENT = /^[A-Za-z0-9][A-Za-z0-9_.-]{0,127}$/;
const MANIFEST_FILE = 'manifest.json';
const MODEL_CALLS_DIR = 'model-calls';

const artifactSchema = z.object({
    projectId: z.string(),
    name: z.string(),
    version: z.number().int().positive(),
    kind: z.enum(['dataset', 'model', 'figure', 'report', 'file']),
    producedBy: z.string(),
    location: z.string(),
    contentHash: z.string(),
    size: z.number().int().nonnegative(),
    createdAt: z.string(),
});
const manifestSchema = z.array(artifactSchema);

export function hashFile(filePath: string): Promise<string> {
    return new Promise((resolve, reject) => {
        const hash = createHash('sha256');
        createReadStream(filePath)
            .on('data', (chunk) => hash.update(chunk))
            .on('error', reject)
            .on('end', () => resolve(hash.digest('hex')));
    });
}

/**
 * Append-only, versioned store of project artifacts on the local filesystem.
 *
 * Layout: `<root>/<projectId>/<name>/manifest.json` lists every version and
 * `<root>/<projectId>/<name>/v<N>/<file>` holds its content. Allocation of the
 * next version number happens under a lock on the name's directory, so
 * concurrent writers (in this process or another) never share a version.
 */
export class ArtifactStore extends BaseService implements ModelCallLog {
    private readonly root: string;

    constructor(config: ArtifactStoreConfig) {
        super(config);
        this.root = path.resolve(config.root);
    }

    public async create(projectId: string, name: string, input: CreateArtifactInput): Promise<Artifact> {
        const nameDir = this.nameDir(projectId, name);
        await mkdir(nameDir, { recursive: true });

        const release = await lock(nameDir, {
            realpath: false,
            retries: { retries: 100, minTimeout: 5, maxTimeout: 200 },
        });
        try {
            const manifest = await this.readManifest(nameDir);
            const version = (manifest.at(-1)?.version ?? 0) + 1;
            const versionDir = path.join(nameDir, `v${version}`);
            await mkdir(versionDir, { recursive: true });

            const fileName = input.fileName ?? ('path' in input.source ? path.basename(input.source.path) : 'content');
            const location = path.join(versionDir, assertSafe(fileName, 'file name'));
            if ('path' in input.source) {
                await copyFile(input.source.path, location);
            } else {
                await writeFile(location, input.source.content);
            }

            const [contentHash, stats] = await Promise.all([hashFile(location), stat(location)]);
            const artifact: Artifact = {
                projectId,
                name,
                version,
                kind: input.kind,
                producedBy: input.producedBy,
                location,
                contentHash,
                size: stats.size,
                createdAt: new Date().toISOString(),
            };

            await this.writeManifest(nameDir, [...manifest, artifact]);
            this.logger.info('Artifact version created', { projectId, name, version, contentHash, size: stats.size });
            return artifact;
        } finally {
            await release();
        }
    }

    public async getLatest(projectId: string, name: string): Promise<Artifact> {
        const manifest = await this.readManifest(this.nameDir(projectId, name));
        const latest = manifest.at(-1);
        if (!latest) throw new ArtifactNotFoundError(projectId, name);
        return latest;
    }

    public async getByVersion(projectId: string, name: string, version: number): Promise<Artifact> {
        const manifest = await this.readManifest(this.nameDir(projectId, name));
        const found = manifest.find((a) => a.version === version);
        if (!found) throw new ArtifactNotFoundError(projectId, name, version);
        return found;
    }

    public async listVersions(projectId: string, name: string): Promise<Artifact[]> {
        return this.readManifest(this.nameDir(projectId, name));
    }

    public async read(artifact: Artifact): Promise<Buffer> {
        return readFile(artifact.location);
    }

    public async attachLogs(projectId: string, invocationId: string, logs: InvocationLogs): Promise<string> {
        const logDir = path.join(this.projectDir(projectId), '_logs', assertSafe(invocationId, 'invocation id'));
        await mkdir(logDir, { recursive: true });
        await Promise.all([
            writeFile(path.join(logDir, 'stdout.log'), logs.stdout),
            writeFile(path.join(logDir, 'stderr.log'), logs.stderr),
        ]);
        return logDir;
    }

    /** `_logs/model-calls/<startedAt>-<callId>.json`, so a directory listing sorts by time. */
    public async recordModelCall(projectId: string, record: ModelCallRecord): Promise<string> {
        const dir = path.join(this.projectDir(projectId), '_logs', MODEL_CALLS_DIR);
        await mkdir(dir, { recursive: true });
        const stamp = record.startedAt.replace(/[:.]/g, '-');
        const file = path.join(dir, `${stamp}-${assertSafe(record.callId, 'call id')}.json`);
        await writeFile(file, JSON.stringify(record, null, 2));
        return file;
    }

    public async deleteProject(projectId: string): Promise<void> {
        await rm(this.projectDir(projectId), { recursive: true, force: true });
        this.logger.info('Project artifacts deleted', { projectId });
    }

    private projectDir(projectId: string): string {
        return path.join(this.root, assertSafe(projectId, 'project id'));
    }

    private nameDir(projectId: string, name: string): string {
        return path.join(this.projectDir(projectId), assertSafe(name, 'artifact name'));
    }

    private async readManifest(nameDir: string): Promise<Artifact[]> {
        let raw: string;
        try {
            raw = await readFile(path.join(nameDir, MANIFEST_FILE), 'utf-8');
        } catch (error) {
            if (isMissingFile(error)) return [];
            throw error;
        }
        return manifestSchema.parse(JSON.parse(raw));
    }

    private async writeManifest(nameDir: string, manifest: Artifact[]): Promise<void> {
        const target = path.join(nameDir, MANIFEST_FILE);
        const tmp = `${target}.tmp`;
        await writeFile(tmp, JSON.stringify(manifest, null, 2), 'utf-8');
        await rename(tmp, target);
    }
}

function assertSafe(segment: string, what: string): string {
    if (!SAFE_SEGMENT.test(segment)) {
        throw new Error(`Invalid ${what}: '${segment}'`);
    }
    return segment;
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
