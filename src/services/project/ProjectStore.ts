// src/services/project/ProjectStore.ts

import Redis from 'ioredis';
import * as storage from 'node-persist';
import winston from 'winston';
import { AppConfig } from '../../config';
import { Project } from '../../models/project.model';
import { projectSchema } from './project.schema';

/** Durable home of project state. Implementations must be write-through safe: `save` resolves only once durable. */
export interface ProjectStore {
    init(): Promise<void>;
    load(projectId: string): Promise<Project | null>;
    save(project: Project): Promise<void>;
    remove(projectId: string): Promise<void>;
    list(): Promise<Project[]>;
    close(): Promise<void>;
}

function parseProject(raw: unknown, logger: winston.Logger): Project | null {
    const parsed = projectSchema.safeParse(raw);
    if (!parsed.success) {
        logger.error('Discarding unreadable project record', { issues: parsed.error.issues.slice(0, 5) });
        return null;
    }
    return parsed.data;
}

export class NodePersistProjectStore implements ProjectStore {
    private storage: storage.LocalStorage;

    constructor(dir: string, private readonly logger: winston.Logger) {
        this.storage = storage.create({
            dir,
            ttl: false,
        });
    }

    public async init(): Promise<void> {
        await this.storage.init();
    }

    public async load(projectId: string): Promise<Project | null> {
        const raw: unknown = await this.storage.getItem(projectId);
        if (raw === undefined || raw === null) return null;
        return parseProject(raw, this.logger);
    }

    public async save(project: Project): Promise<void> {
        await this.storage.setItem(project.id, project);
    }

    public async remove(projectId: string): Promise<void> {
        await this.storage.removeItem(projectId);
    }

    public async list(): Promise<Project[]> {
        const values: unknown[] = await this.storage.values();
        return values.flatMap((raw) => parseProject(raw, this.logger) ?? []);
    }

    public async close(): Promise<void> {
        // Every setItem is already on disk when it resolves.
    }
}

/** The ioredis commands the Redis store uses. */
export interface ProjectRedisClient {
    get(key: string): Promise<string | null>;
    set(key: string, value: string): Promise<unknown>;
    del(key: string): Promise<number>;
    sadd(key: string, member: string): Promise<number>;
    srem(key: string, member: string): Promise<number>;
    smembers(key: string): Promise<string[]>;
    quit(): Promise<unknown>;
}

export class RedisProjectStore implements ProjectStore {
    private readonly PROJECT_KEY_PREFIX = 'project:';
    private readonly INDEX_KEY = 'projects';

    constructor(private readonly redis: ProjectRedisClient, private readonly logger: winston.Logger) {}

    public async init(): Promise<void> {
        const ids = await this.redis.smembers(this.INDEX_KEY);
        this.logger.info('Redis project store ready', { projects: ids.length });
    }

    public async load(projectId: string): Promise<Project | null> {
        const raw = await this.redis.get(this.key(projectId));
        if (raw === null) return null;
        return parseProject(JSON.parse(raw), this.logger);
    }

    public async save(project: Project): Promise<void> {
        await this.redis.set(this.key(project.id), JSON.stringify(project));
        await this.redis.sadd(this.INDEX_KEY, project.id);
    }

    public async remove(projectId: string): Promise<void> {
        await this.redis.del(this.key(projectId));
        await this.redis.srem(this.INDEX_KEY, projectId);
    }

    public async list(): Promise<Project[]> {
        const ids = await this.redis.smembers(this.INDEX_KEY);
        const projects: Project[] = [];
        for (const id of ids) {
            const project = await this.load(id);
            if (project) projects.push(project);
        }
        return projects;
    }

    public async close(): Promise<void> {
        await this.redis.quit();
    }

    private key(projectId: string): string {
        return `${this.PROJECT_KEY_PREFIX}${projectId}`;
    }
}

export function createProjectStore(config: AppConfig, logger: winston.Logger): ProjectStore {
    if (config.projectStore.kind === 'redis') {
        return new RedisProjectStore(new Redis(config.projectStore.url), logger);
    }
    return new NodePersistProjectStore(config.projectStore.dir, logger);
}
