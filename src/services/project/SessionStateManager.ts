// src/services/project/SessionStateManager.ts

import { v4 as uuidv4 } from 'uuid';
import { BaseService } from '../base/BaseService';
import { ServiceConfig } from '../base/types';
import { ArtifactStore } from '../artifact/ArtifactStore';
import { Artifact, ArtifactKind } from '../../models/artifact.model';
import {
    PipelineStage,
    PrivacyMode,
    Project,
    stageRank,
    ToolInvocation,
    Turn,
    TurnDraft,
} from '../../models/project.model';
import {
    ArtifactNotFoundError,
    ConcurrentModificationError,
    ConfigError,
    errorMessage,
    PersistenceError,
    ProjectNotFoundError,
} from '../../errors';
import { ProjectStore } from './ProjectStore';

export interface SessionStateManagerConfig extends ServiceConfig {
    store: ProjectStore;
    artifactStore: ArtifactStore;
    defaultProfile: string;
    /** Profiles a project may select. */
    profiles: string[];
}

export interface CreateProjectInput {
    title?: string;
    profile?: string;
    privacyMode?: PrivacyMode;
}

/**
 * Exclusive right to mutate a project for the duration of one user turn.
 * Writes made with the hold queue behind each other; writes made without it
 * are rejected until it is released.
 */
export interface TurnHold {
    readonly projectId: string;
    release(): void;
}

export interface ProjectSummary {
    id: string;
    title: string;
    profile: string;
    privacyMode: PrivacyMode;
    stage: PipelineStage;
    turnCount: number;
    createdAt: string;
    updatedAt: string;
}

export type InvocationPatch = Partial<Pick<ToolInvocation, 'status' | 'failureKind' | 'startedAt' | 'finishedAt'>>;

export interface ImportArtifactInput {
    name: string;
    kind?: ArtifactKind;
    fileName: string;
    content: Buffer | string;
}

/**
 * Owns every project's conversation, invocation log, stage and artifact
 * index. Outside a turn, a second mutation while one is in flight fails with
 * ConcurrentModificationError instead of waiting. While a turn holds the
 * project (see {@link openTurn}) only the holder may write, and its writes
 * are queued. The store is written before the in-memory view changes.
 */
export class SessionStateManager extends BaseService {
    private readonly store: ProjectStore;
    private readonly artifactStore: ArtifactStore;
    private readonly defaultProfile: string;
    private readonly profiles: Set<string>;
    private readonly cache = new Map<string, Project>();
    private readonly inFlight = new Set<string>();
    private readonly holds = new Map<string, TurnHold>();
    private readonly queues = new Map<string, Promise<unknown>>();

    constructor(config: SessionStateManagerConfig) {
        super(config);
        this.store = config.store;
        this.artifactStore = config.artifactStore;
        this.defaultProfile = config.defaultProfile;
        this.profiles = new Set(config.profiles);
    }

    public async createProject(input: CreateProjectInput = {}): Promise<Project> {
        const profile = input.profile ?? this.defaultProfile;
        if (!this.profiles.has(profile)) {
            throw new ConfigError([`unknown provider profile '${profile}'`]);
        }

        const now = new Date().toISOString();
        const project: Project = {
            id: uuidv4(),
            title: input.title?.trim() || 'Untitled project',
            profile,
            privacyMode: input.privacyMode ?? 'default',
            stage: 'Ingest',
            createdAt: now,
            updatedAt: now,
            nextSequence: 1,
            turns: [],
            invocations: {},
            artifactIndex: {},
        };

        await this.persist(project);
        this.cache.set(project.id, project);
        this.logger.info('Project created', { projectId: project.id, profile });
        return structuredClone(project);
    }

    /**
     * Claims the project for one user turn. Throws ConcurrentModificationError
     * when another turn holds it or a mutation is in flight.
     */
    public openTurn(projectId: string): TurnHold {
        if (this.holds.has(projectId)) {
            throw new ConcurrentModificationError(projectId, 'a turn is already being processed');
        }
        if (this.inFlight.has(projectId)) {
            throw new ConcurrentModificationError(projectId, 'another mutation is in flight');
        }
        const hold: TurnHold = {
            projectId,
            release: () => {
                if (this.holds.get(projectId) === hold) this.holds.delete(projectId);
            },
        };
        this.holds.set(projectId, hold);
        return hold;
    }

    public async append(projectId: string, draft: TurnDraft, hold?: TurnHold): Promise<Turn> {
        return this.mutate(projectId, 'append', hold, (project) => {
            const turn: Turn = {
                sequence: project.nextSequence,
                projectId,
                role: draft.role,
                content: structuredClone(draft.content),
                timestamp: new Date().toISOString(),
            };
            project.turns.push(turn);
            project.nextSequence += 1;
            return structuredClone(turn);
        });
    }

    public async currentStage(projectId: string): Promise<PipelineStage> {
        return (await this.load(projectId)).stage;
    }

    /**
     * Without a name: the latest committed version of every artifact. With a
     * name: all its committed versions, or only the one asked for. Versions
     * the store holds beyond the project's index are never returned.
     */
    public async artifacts(projectId: string, name?: string, version?: number): Promise<Artifact[]> {
        const { artifactIndex } = await this.load(projectId);
        if (name === undefined) {
            return Promise.all(
                Object.keys(artifactIndex)
                    .sort()
                    .map((artifactName) =>
                        this.artifactStore.getByVersion(projectId, artifactName, artifactIndex[artifactName]),
                    ),
            );
        }
        const committed = artifactIndex[name] ?? 0;
        if (version !== undefined) {
            if (version > committed) throw new ArtifactNotFoundError(projectId, name, version);
            return [await this.artifactStore.getByVersion(projectId, name, version)];
        }
        return (await this.artifactStore.listVersions(projectId, name)).filter((a) => a.version <= committed);
    }

    public async snapshot(projectId: string): Promise<Project> {
        return structuredClone(await this.load(projectId));
    }

    /**
     * Rehydrates a project from durable storage, dropping whatever this
     * process had cached for it.
     */
    public async restore(projectId: string): Promise<Project> {
        const project = await this.exclusive(projectId, 'restore', undefined, async () => {
            this.cache.delete(projectId);
            return this.load(projectId);
        });
        this.logger.info('Project restored', { projectId, turns: project.turns.length });
        return structuredClone(project);
    }

    public async deleteProject(projectId: string): Promise<void> {
        await this.exclusive(projectId, 'delete', undefined, async () => {
            await this.load(projectId);
            try {
                await this.store.remove(projectId);
            } catch (error) {
                throw new PersistenceError(`Could not delete project ${projectId}: ${errorMessage(error)}`, { cause: error });
            }
            this.cache.delete(projectId);
            await this.artifactStore.deleteProject(projectId);
        });
        this.logger.info('Project deleted', { projectId });
    }

    public async listProjects(): Promise<ProjectSummary[]> {
        const projects = await this.store.list();
        return projects
            .map((p) => ({
                id: p.id,
                title: p.title,
                profile: p.profile,
                privacyMode: p.privacyMode,
                stage: p.stage,
                turnCount: p.turns.length,
                createdAt: p.createdAt,
                updatedAt: p.updatedAt,
            }))
            .sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
    }

    public async recordInvocation(projectId: string, invocation: ToolInvocation, hold?: TurnHold): Promise<void> {
        await this.mutate(projectId, 'recordInvocation', hold, (project) => {
            project.invocations[invocation.id] = structuredClone(invocation);
        });
    }

    public async updateInvocation(
        projectId: string,
        invocationId: string,
        patch: InvocationPatch,
        hold?: TurnHold,
    ): Promise<ToolInvocation> {
        return this.mutate(projectId, 'updateInvocation', hold, (project) => {
            const existing = project.invocations[invocationId];
            if (!existing) {
                throw new Error(`Invocation ${invocationId} is not recorded on project ${projectId}`);
            }
            const updated = { ...existing, ...patch };
            project.invocations[invocationId] = updated;
            return structuredClone(updated);
        });
    }

    /** Moves the stage forward; a lower stage leaves it unchanged. */
    public async advanceStage(projectId: string, stage: PipelineStage, hold?: TurnHold): Promise<PipelineStage> {
        return this.mutate(projectId, 'advanceStage', hold, (project) => {
            if (stageRank(stage) > stageRank(project.stage)) {
                this.logger.info('Pipeline stage advanced', { projectId, from: project.stage, to: stage });
                project.stage = stage;
            }
            return project.stage;
        });
    }

    /** Commits versions to the project's index; the index only moves forward. */
    public async recordArtifacts(projectId: string, artifacts: Artifact[], hold?: TurnHold): Promise<void> {
        await this.mutate(projectId, 'recordArtifacts', hold, (project) => {
            for (const artifact of artifacts) {
                const known = project.artifactIndex[artifact.name] ?? 0;
                project.artifactIndex[artifact.name] = Math.max(known, artifact.version);
            }
        });
    }

    /**
     * Registers an uploaded file as a new artifact version produced by
     * `upload`. Rejected before anything is stored while a turn holds the
     * project.
     */
    public async importArtifact(projectId: string, input: ImportArtifactInput): Promise<Artifact> {
        const artifact = await this.exclusive(projectId, 'import', undefined, async () => {
            await this.load(projectId);
            const created = await this.artifactStore.create(projectId, input.name, {
                kind: input.kind ?? 'dataset',
                producedBy: 'upload',
                source: { content: input.content },
                fileName: input.fileName,
            });
            await this.commit(projectId, (project) => {
                const known = project.artifactIndex[created.name] ?? 0;
                project.artifactIndex[created.name] = Math.max(known, created.version);
            });
            return created;
        });
        this.logger.info('Artifact imported', { projectId, name: artifact.name, version: artifact.version });
        return artifact;
    }

    private async load(projectId: string): Promise<Project> {
        const cached = this.cache.get(projectId);
        if (cached) return cached;

        let stored: Project | null;
        try {
            stored = await this.store.load(projectId);
        } catch (error) {
            throw new PersistenceError(`Could not load project ${projectId}: ${errorMessage(error)}`, { cause: error });
        }
        if (!stored) throw new ProjectNotFoundError(projectId);
        this.cache.set(projectId, stored);
        return stored;
    }

    private async persist(project: Project): Promise<void> {
        try {
            await this.store.save(project);
        } catch (error) {
            this.logger.error('Project write failed', { projectId: project.id, error: errorMessage(error) });
            throw new PersistenceError(`Could not save project ${project.id}: ${errorMessage(error)}`, { cause: error });
        }
    }

    /**
     * Runs `work` as the only writer of the project: queued behind earlier
     * writes of the same turn when `hold` is the current hold, otherwise under
     * the fail-fast in-flight guard.
     */
    private async exclusive<T>(
        projectId: string,
        operation: string,
        hold: TurnHold | undefined,
        work: () => Promise<T>,
    ): Promise<T> {
        const current = this.holds.get(projectId);
        if (current) {
            if (hold !== current) {
                throw new ConcurrentModificationError(projectId, `${operation} while a turn is being processed`);
            }
            return this.enqueue(projectId, work);
        }
        if (hold) {
            throw new ConcurrentModificationError(projectId, `${operation} after its turn was released`);
        }
        return this.guarded(projectId, operation, work);
    }

    private enqueue<T>(projectId: string, work: () => Promise<T>): Promise<T> {
        const previous = this.queues.get(projectId) ?? Promise.resolve();
        const next = previous.then(work);
        const settled = next.then(
            () => undefined,
            () => undefined,
        );
        this.queues.set(projectId, settled);
        void settled.then(() => {
            if (this.queues.get(projectId) === settled) this.queues.delete(projectId);
        });
        return next;
    }

    private async guarded<T>(projectId: string, operation: string, work: () => Promise<T>): Promise<T> {
        if (this.inFlight.has(projectId)) {
            throw new ConcurrentModificationError(projectId, `${operation} while another mutation is in flight`);
        }
        this.inFlight.add(projectId);
        try {
            return await work();
        } finally {
            this.inFlight.delete(projectId);
        }
    }

    private async mutate<T>(
        projectId: string,
        operation: string,
        hold: TurnHold | undefined,
        change: (draft: Project) => T,
    ): Promise<T> {
        return this.exclusive(projectId, operation, hold, () => this.commit(projectId, change));
    }

    /** Applies `change` to a copy, persists the copy, then swaps it in. */
    private async commit<T>(projectId: string, change: (draft: Project) => T): Promise<T> {
        const draft = structuredClone(await this.load(projectId));
        const result = change(draft);
        draft.updatedAt = new Date().toISOString();
        await this.persist(draft);
        this.cache.set(projectId, draft);
        return result;
    }
}
