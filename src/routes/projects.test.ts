import express from 'express';
import request from 'supertest';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createApp } from '../app';
import { createNullLogger } from '../utils/logger';
import { ArtifactStore } from '../services/artifact/ArtifactStore';
import { OrchestrationLoop } from '../services/orchestration/OrchestrationLoop';
import { SessionStateManager } from '../services/project/SessionStateManager';
import { ToolExecutor } from '../services/sandbox/sandbox.types';
import { ToolRegistry } from '../services/tool/ToolRegistry';
import { imputeDescriptor, makeTempDir } from '../test-utils/fixtures';
import { InMemoryProjectStore } from '../test-utils/memoryStores';
import { failedExecution, FakeExecutor, ScriptedModel, textReply, toolReply } from '../test-utils/scriptedModel';

const logger = createNullLogger();

const idle = () =>
    new FakeExecutor(async () => {
        throw new Error('the executor must not be called');
    });

describe('projects API', () => {
    let tmp: { dir: string; cleanup: () => Promise<void> };
    let sessions: SessionStateManager;
    let artifactStore: ArtifactStore;

    const appWith = (model: ScriptedModel, executor: ToolExecutor = idle()): express.Express => {
        const registry = new ToolRegistry({ logger });
        registry.register(imputeDescriptor());
        registry.freeze();
        const loop = new OrchestrationLoop({
            logger,
            sessions,
            registry,
            executor,
            providerFor: () => model,
            settings: {
                contextWindowTurns: 24,
                maxCorrectiveRetries: 2,
                maxModelRounds: 8,
                errorExcerptChars: 1200,
                followUpSummary: false,
            },
        });
        return createApp({ logger, sessions, loop, artifactStore, registry });
    };

    beforeEach(async () => {
        tmp = await makeTempDir('api-');
        artifactStore = new ArtifactStore({ logger, root: tmp.dir });
        sessions = new SessionStateManager({
            logger,
            store: new InMemoryProjectStore(),
            artifactStore,
            defaultProfile: 'groq-default',
            profiles: ['groq-default'],
        });
    });

    afterEach(async () => {
        await tmp.cleanup();
    });

    it('creates a project and reads it back with its loop state', async () => {
        const app = appWith(new ScriptedModel([]));

        const created = await request(app)
            .post('/api/projects')
            .send({ title: 'Churn', privacyMode: 'guardrail' })
            .expect(201);

        expect(created.body).toMatchObject({ title: 'Churn', privacyMode: 'guardrail', stage: 'Ingest' });
        const fetched = await request(app).get(`/api/projects/${created.body.id}`).expect(200);
        expect(fetched.body).toMatchObject({ id: created.body.id, state: 'AwaitingUser', turns: [] });
    });

    it('rejects an invalid body with the offending field', async () => {
        const res = await request(appWith(new ScriptedModel([])))
            .post('/api/projects')
            .send({ privacyMode: 'loose' })
            .expect(400);

        expect(res.body.code).toBe('invalid_request');
        expect(res.body.details).toHaveLength(1);
        expect(res.body.details[0]).toMatch(/^privacyMode: /);
    });

    it('answers 404 for an unknown project', async () => {
        const res = await request(appWith(new ScriptedModel([]))).get('/api/projects/missing').expect(404);

        expect(res.body).toEqual({ error: 'Project not found: missing', code: 'project_not_found' });
    });

    it('imports an upload and serves its committed versions', async () => {
        const app = appWith(new ScriptedModel([]));
        const { id } = await sessions.createProject();

        const imported = await request(app)
            .post(`/api/projects/${id}/artifacts/import`)
            .send({ fileName: 'patients.csv', contentBase64: Buffer.from('age\n40\n').toString('base64') })
            .expect(201);

        expect(imported.body).toMatchObject({ name: 'upload', version: 1, producedBy: 'upload', kind: 'dataset' });
        const listed = await request(app).get(`/api/projects/${id}/artifacts`).expect(200);
        expect(listed.body.map((a: { name: string; version: number }) => `${a.name}@${a.version}`)).toEqual(['upload@1']);
        const content = await request(app)
            .get(`/api/projects/${id}/artifacts/upload/versions/1/content`)
            .responseType('blob')
            .expect(200);
        expect(Buffer.from(content.body).toString('utf-8')).toBe('age\n40\n');
        const missing = await request(app).get(`/api/projects/${id}/artifacts/upload/versions/2`).expect(404);
        expect(missing.body.code).toBe('artifact_not_found');
    });

    it('runs a user turn and returns the turns it appended', async () => {
        const app = appWith(new ScriptedModel([textReply('Hello.')]));
        const { id } = await sessions.createProject();

        const res = await request(app).post(`/api/projects/${id}/turns`).send({ text: 'hi' }).expect(200);

        expect(res.body.turns.map((t: { content: unknown }) => t.content)).toEqual([
            { kind: 'text', text: 'hi' },
            { kind: 'text', text: 'Hello.' },
        ]);
    });

    it('answers 409 to writes while a turn runs and cancels it on request', async () => {
        let started: () => void = () => undefined;
        const toolStarted = new Promise<void>((resolve) => {
            started = resolve;
        });
        const executor = new FakeExecutor(
            (sandboxRequest, signal) =>
                new Promise((resolve) => {
                    signal?.addEventListener('abort', () =>
                        resolve(failedExecution(sandboxRequest, 'Cancelled', 'The tool run was cancelled.')),
                    );
                    started();
                }),
        );
        const app = appWith(new ScriptedModel([toolReply({ name: 'HyperImputeImputation', args: {} })]), executor);
        const { id } = await sessions.createProject();
        await sessions.importArtifact(id, { name: 'dataset', fileName: 'patients.csv', content: 'age\n40\n' });

        const running = request(app).post(`/api/projects/${id}/turns`).send({ text: 'impute' }).then((res) => res);
        await toolStarted;

        const second = await request(app).post(`/api/projects/${id}/turns`).send({ text: 'again' }).expect(409);
        expect(second.body.code).toBe('concurrent_modification');
        const upload = await request(app)
            .post(`/api/projects/${id}/artifacts/import`)
            .send({ fileName: 'late.csv', contentBase64: Buffer.from('x').toString('base64') })
            .expect(409);
        expect(upload.body.code).toBe('concurrent_modification');
        await request(app).delete(`/api/projects/${id}`).expect(409);

        const cancel = await request(app).post(`/api/projects/${id}/cancel`).expect(200);
        expect(cancel.body).toEqual({ cancelled: true });
        const finished = await running;
        expect(finished.status).toBe(200);
        expect(finished.body.turns.at(-1).content).toEqual({
            kind: 'failure',
            reason: 'cancelled',
            message: 'The request was cancelled while a tool was running.',
        });
        expect(await artifactStore.listVersions(id, 'upload')).toEqual([]);
    });
});
