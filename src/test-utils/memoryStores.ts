// src/test-utils/memoryStores.ts

import { Project } from '../models/project.model';
import { ProjectRedisClient, ProjectStore } from '../services/project/ProjectStore';

export class InMemoryProjectStore implements ProjectStore {
    readonly records = new Map<string, Project>();
    saves = 0;
    /** When set, the next `save` rejects with this error. */
    failNextSave: Error | null = null;

    async init(): Promise<void> {}

    async load(projectId: string): Promise<Project | null> {
        const project = this.records.get(projectId);
        return project ? structuredClone(project) : null;
    }

    async save(project: Project): Promise<void> {
        await new Promise((resolve) => setImmediate(resolve));
        if (this.failNextSave) {
            const error = this.failNextSave;
            this.failNextSave = null;
            throw error;
        }
        this.saves += 1;
        this.records.set(project.id, structuredClone(project));
    }

    async remove(projectId: string): Promise<void> {
        this.records.delete(projectId);
    }

    async list(): Promise<Project[]> {
        return Array.from(this.records.values(), (p) => structuredClone(p));
    }

    async close(): Promise<void> {}
}

export class FakeRedis implements ProjectRedisClient {
    readonly strings = new Map<string, string>();
    readonly sets = new Map<string, Set<string>>();
    quitCalled = false;

    async get(key: string): Promise<string | null> {
        return this.strings.get(key) ?? null;
    }

    async set(key: string, value: string): Promise<'OK'> {
        this.strings.set(key, value);
        return 'OK';
    }

    async del(key: string): Promise<number> {
        const existed = this.strings.delete(key) || this.sets.delete(key);
        return existed ? 1 : 0;
    }

    async sadd(key: string, member: string): Promise<number> {
        const set = this.sets.get(key) ?? new Set<string>();
        this.sets.set(key, set);
        if (set.has(member)) return 0;
        set.add(member);
        return 1;
    }

    async srem(key: string, member: string): Promise<number> {
        return this.sets.get(key)?.delete(member) ? 1 : 0;
    }

    async smembers(key: string): Promise<string[]> {
        return Array.from(this.sets.get(key) ?? []);
    }

    async quit(): Promise<'OK'> {
        this.quitCalled = true;
        return 'OK';
    }
}
