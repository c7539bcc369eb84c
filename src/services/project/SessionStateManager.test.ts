import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
    ArtifactNotFoundError,
    ConcurrentModificationError,
    ConfigError,
    PersistenceError,
    ProjectNotFoundError,
} from '../../errors';
import { createNullLogger } from '../../utils/logger';
import { ArtifactStore } from '../artifact/ArtifactStore';
import { SessionStateManager } from './SessionStateManager';
import { InMemoryProjectStore } from '../../test-utils/memoryStores';
import { makeTempDir } from '../../test-utils/fixtures';

const logger = createNullLogger();

describe('SessionStateManager', () => {
    let tmp: { dir: string; cleanup: () => Promise<void> };
    let store: InMemoryProjectStore;
    let artifactStore: ArtifactStore;
    let manager: SessionStateManager;

    beforeEach(async () => {
        tmp = await makeTempDir();
        store = new InMemoryProjectStore();
        artifactStore = new ArtifactStore({ logger, root: tmp.dir });
        manager = new SessionStateManager({
            logger,
            store,
            artifactStore,
            defaultProfile: 'groq-default',
            profiles: ['groq-default', 'openai-default'],
        });
    });

    afterEach(async () => {
        await tmp.cleanup();
    });

    it('creates projects at the Ingest stage with the default profile', async () => {
        const project = await manager.createProject({ title: '  Churn study ' });

        expect(project.title).toBe('Churn study');
        expect(project.profile).toBe('groq-default');
        expect(project.stage).toBe('Ingest');
        expect(project.nextSequence).toBe(1);
        expect(project.privacyMode).toBe('default');
        expect(store.records.has(project.id)).toBe(true);
    });

    it('records the privacy mode chosen at creation', async () => {
        const project = await manager.createProject({ privacyMode: 'guardrail' });

        expect(store.records.get(project.id)?.privacyMode).toBe('guardrail');
        expect(await manager.listProjects()).toMatchObject([{ id: project.id, privacyMode: 'guardrail' }]);
    });

    it('rejects unknown profiles', async () => {
        await expect(manager.createProject({ profile: 'nope' })).rejects.toBeInstanceOf(ConfigError);
    });

    it('assigns gap-free sequence numbers', async () => {
        const { id } = await manager.createProject();

        const first = await manager.append(id, { role: 'user', content: { kind: 'text', text: 'hi' } });
        const second = await manager.append(id, { role: 'assistant', content: { kind: 'text', text: 'hello' } });

        expect([first.sequence, second.sequence]).toEqual([1, 2]);
        const snapshot = await manager.snapshot(id);
        expect(snapshot.turns.map((t) => t.sequence)).toEqual([1, 2]);
        expect(snapshot.nextSequence).toBe(3);
    });

    it('rejects the second of two concurrent appends', async () => {
        const { id } = await manager.createProject();

        const first = manager.append(id, { role: 'user', content: { kind: 'text', text: 'one' } });
        const second = manager.append(id, { role: 'user', content: { kind: 'text', text: 'two' } });

        await expect(second).rejects.toBeInstanceOf(ConcurrentModificationError);
        await expect(first).resolves.toMatchObject({ sequence: 1 });
        expect((await manager.snapshot(id)).turns).toHaveLength(1);
    });

    it('lets independent projects mutate concurrently', async () => {
        const a = await manager.createProject();
        const b = await manager.createProject();

        const turns = await Promise.all([
            manager.append(a.id, { role: 'user', content: { kind: 'text', text: 'a' } }),
            manager.append(b.id, { role: 'user', content: { kind: 'text', text: 'b' } }),
        ]);

        expect(turns.map((t) => t.sequence)).toEqual([1, 1]);
    });

    it('leaves the committed view untouched when the store write fails', async () => {
        const { id } = await manager.createProject();
        await manager.append(id, { role: 'user', content: { kind: 'text', text: 'kept' } });
        store.failNextSave = new Error('disk full');

        await expect(
            manager.append(id, { role: 'assistant', content: { kind: 'text', text: 'lost' } }),
        ).rejects.toBeInstanceOf(PersistenceError);

        const snapshot = await manager.snapshot(id);
        expect(snapshot.turns).toHaveLength(1);
        expect(snapshot.nextSequence).toBe(2);
        const next = await manager.append(id, { role: 'assistant', content: { kind: 'text', text: 'retry' } });
        expect(next.sequence).toBe(2);
    });

    it('hands out snapshots that do not alias internal state', async () => {
        const { id } = await manager.createProject();
        await manager.append(id, { role: 'user', content: { kind: 'text', text: 'original' } });

        const snapshot = await manager.snapshot(id);
        snapshot.turns.pop();
        snapshot.stage = 'Done';

        const again = await manager.snapshot(id);
        expect(again.turns).toHaveLength(1);
        expect(again.stage).toBe('Ingest');
    });

    it('restores a project from the store, replacing what it had cached', async () => {
        const { id } = await manager.createProject();
        await manager.append(id, { role: 'user', content: { kind: 'text', text: 'one' } });
        const other = new SessionStateManager({
            logger,
            store,
            artifactStore,
            defaultProfile: 'groq-default',
            profiles: ['groq-default'],
        });
        await other.append(id, { role: 'assistant', content: { kind: 'text', text: 'two' } });
        expect((await manager.snapshot(id)).turns).toHaveLength(1);

        const restored = await manager.restore(id);

        expect(restored.turns.map((t) => t.content)).toEqual([
            { kind: 'text', text: 'one' },
            { kind: 'text', text: 'two' },
        ]);
        expect(restored.nextSequence).toBe(3);
        const next = await manager.append(id, { role: 'user', content: { kind: 'text', text: 'three' } });
        expect(next.sequence).toBe(3);
    });

    it('fails to restore a project the store does not have', async () => {
        await expect(manager.restore('missing')).rejects.toBeInstanceOf(ProjectNotFoundError);
    });

    it('queues the writes of the turn that holds the project', async () => {
        const { id } = await manager.createProject();
        const hold = manager.openTurn(id);

        const [first, second, stage] = await Promise.all([
            manager.append(id, { role: 'user', content: { kind: 'text', text: 'one' } }, hold),
            manager.append(id, { role: 'assistant', content: { kind: 'text', text: 'two' } }, hold),
            manager.advanceStage(id, 'Explore', hold),
        ]);
        hold.release();

        expect([first.sequence, second.sequence, stage]).toEqual([1, 2, 'Explore']);
        const project = await manager.snapshot(id);
        expect(project.nextSequence).toBe(3);
        expect(project.stage).toBe('Explore');
    });

    it('refuses every other write while a turn holds the project', async () => {
        const { id } = await manager.createProject();
        const hold = manager.openTurn(id);

        expect(() => manager.openTurn(id)).toThrow(ConcurrentModificationError);
        await expect(
            manager.append(id, { role: 'user', content: { kind: 'text', text: 'sneaky' } }),
        ).rejects.toBeInstanceOf(ConcurrentModificationError);
        await expect(
            manager.importArtifact(id, { name: 'upload', fileName: 'a.csv', content: 'x' }),
        ).rejects.toBeInstanceOf(ConcurrentModificationError);
        await expect(manager.deleteProject(id)).rejects.toBeInstanceOf(ConcurrentModificationError);
        await expect(manager.restore(id)).rejects.toBeInstanceOf(ConcurrentModificationError);
        expect(await artifactStore.listVersions(id, 'upload')).toEqual([]);

        hold.release();

        await expect(
            manager.append(id, { role: 'user', content: { kind: 'text', text: 'late' } }, hold),
        ).rejects.toBeInstanceOf(ConcurrentModificationError);
        const turn = await manager.append(id, { role: 'user', content: { kind: 'text', text: 'after' } });
        expect(turn.sequence).toBe(1);
    });

    it('does not open a turn while another mutation is in flight', async () => {
        const { id } = await manager.createProject();

        const pending = manager.append(id, { role: 'user', content: { kind: 'text', text: 'one' } });

        expect(() => manager.openTurn(id)).toThrow(ConcurrentModificationError);
        await pending;
        manager.openTurn(id).release();
    });

    it('loads projects from the store after a restart', async () => {
        const { id } = await manager.createProject({ title: 'Persisted' });
        await manager.append(id, { role: 'user', content: { kind: 'text', text: 'hi' } });

        const restarted = new SessionStateManager({
            logger,
            store,
            artifactStore,
            defaultProfile: 'groq-default',
            profiles: ['groq-default'],
        });

        expect((await restarted.snapshot(id)).turns).toHaveLength(1);
        expect(await restarted.listProjects()).toMatchObject([{ id, title: 'Persisted', turnCount: 1 }]);
    });

    it('advances the stage monotonically', async () => {
        const { id } = await manager.createProject();

        expect(await manager.advanceStage(id, 'Engineer')).toBe('Engineer');
        expect(await manager.advanceStage(id, 'Explore')).toBe('Engineer');
        expect(await manager.currentStage(id)).toBe('Engineer');
    });

    it('tracks invocations', async () => {
        const { id } = await manager.createProject();
        await manager.recordInvocation(id, {
            id: 'inv-1',
            toolName: 'DescriptiveStatistics',
            arguments: { dataset: 'latest' },
            turnSequence: 1,
            status: 'Pending',
        });

        const updated = await manager.updateInvocation(id, 'inv-1', { status: 'Failed', failureKind: 'Timeout' });

        expect(updated).toMatchObject({ status: 'Failed', failureKind: 'Timeout', toolName: 'DescriptiveStatistics' });
        expect((await manager.snapshot(id)).invocations['inv-1'].status).toBe('Failed');
    });

    it('imports uploads as artifacts and lists them', async () => {
        const { id } = await manager.createProject();

        const first = await manager.importArtifact(id, { name: 'dataset', fileName: 'patients.csv', content: 'age\n40\n' });
        await manager.importArtifact(id, { name: 'dataset', fileName: 'patients.csv', content: 'age\n41\n' });

        expect(first).toMatchObject({ name: 'dataset', version: 1, producedBy: 'upload', kind: 'dataset' });
        expect((await manager.snapshot(id)).artifactIndex).toEqual({ dataset: 2 });
        expect((await manager.artifacts(id)).map((a) => a.version)).toEqual([2]);
        expect((await manager.artifacts(id, 'dataset')).map((a) => a.version)).toEqual([1, 2]);
        expect((await manager.artifacts(id, 'dataset', 1))[0].contentHash).toBe(first.contentHash);
    });

    it('only exposes versions recorded in the artifact index', async () => {
        const { id } = await manager.createProject();
        await manager.importArtifact(id, { name: 'dataset', fileName: 'patients.csv', content: 'age\n40\n' });
        await artifactStore.create(id, 'dataset', { kind: 'dataset', producedBy: 'inv-9', source: { content: 'orphan' }, fileName: 'x.csv' });

        expect((await manager.artifacts(id)).map((a) => a.version)).toEqual([1]);
        expect((await manager.artifacts(id, 'dataset')).map((a) => a.version)).toEqual([1]);
        await expect(manager.artifacts(id, 'dataset', 2)).rejects.toBeInstanceOf(ArtifactNotFoundError);
    });

    it('deletes projects explicitly', async () => {
        const { id } = await manager.createProject();
        await manager.importArtifact(id, { name: 'dataset', fileName: 'a.csv', content: 'x' });

        await manager.deleteProject(id);

        expect(store.records.has(id)).toBe(false);
        await expect(manager.snapshot(id)).rejects.toBeInstanceOf(ProjectNotFoundError);
        expect(await artifactStore.listVersions(id, 'dataset')).toEqual([]);
    });

    it('reports unknown projects', async () => {
        await expect(manager.currentStage('missing')).rejects.toBeInstanceOf(ProjectNotFoundError);
    });
});
