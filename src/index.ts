// src/index.ts

import { createServer, IncomingMessage } from 'http';
import { RawData, WebSocket, WebSocketServer } from 'ws';
import winston from 'winston';

import { loadConfig, loadDotenv } from './config';
import { errorMessage } from './errors';
import { createLogger } from './utils/logger';
import { ToolRegistry } from './services/tool/ToolRegistry';
import { ArtifactStore } from './services/artifact/ArtifactStore';
import { ExecutionSandbox } from './services/sandbox/ExecutionSandbox';
import { createProjectStore } from './services/project/ProjectStore';
import { SessionStateManager } from './services/project/SessionStateManager';
import { createProviderAdapter, ProviderAdapter } from './services/provider/ProviderAdapter';
import { OrchestrationLoop } from './services/orchestration/OrchestrationLoop';
import { StreamManager } from './services/stream/StreamManager';
import { projectIdFromUrl, StreamGateway } from './services/stream/StreamGateway';
import { createApp } from './app';

async function main(): Promise<void> {
    loadDotenv();
    const config = loadConfig();
    const logger = createLogger('pipeline-pilot', config.logLevel);

    // --- Service Initialization ---
    const registry = ToolRegistry.fromCatalogFile({ logger }, config.toolCatalogPath);
    const artifactStore = new ArtifactStore({ logger, root: config.artifactRoot });
    const sandbox = new ExecutionSandbox({ logger, settings: config.sandbox, artifactStore });
    await sandbox.reset();

    const projectStore = createProjectStore(config, logger);
    await projectStore.init();
    const sessions = new SessionStateManager({
        logger,
        store: projectStore,
        artifactStore,
        defaultProfile: config.defaultProfile,
        profiles: Object.keys(config.providers),
    });

    const adapters = new Map<string, ProviderAdapter>();
    const providerFor = (profile: string): ProviderAdapter => {
        let adapter = adapters.get(profile);
        if (!adapter) {
            adapter = createProviderAdapter(config, profile, logger);
            adapters.set(profile, adapter);
        }
        return adapter;
    };

    const loop = new OrchestrationLoop({
        logger,
        sessions,
        registry,
        executor: sandbox,
        providerFor,
        settings: config.loop,
        modelCallLog: config.logModelCalls ? artifactStore : undefined,
    });
    const streamManager = new StreamManager({ logger });
    streamManager.attach(loop);
    const gateway = new StreamGateway({ logger, sessions, loop, streams: streamManager });

    // --- HTTP ---
    const app = createApp({ logger, sessions, loop, artifactStore, registry });
    const server = createServer(app);
    const wss = new WebSocketServer({ server });

    wss.on('connection', (ws: WebSocket, req: IncomingMessage) => {
        acceptConnection(ws, req).catch((error: unknown) => {
            logger.error('WebSocket connection setup failed', { error: errorMessage(error) });
            ws.terminate();
        });
    });

    async function acceptConnection(ws: WebSocket, req: IncomingMessage): Promise<void> {
        const projectId = projectIdFromUrl(req.url);
        if (!(await gateway.accept(projectId, ws))) return;

        ws.on('message', (message: RawData) => {
            void gateway.handleMessage(projectId, message.toString());
        });
        ws.on('close', () => gateway.disconnect(projectId, ws));
        ws.on('error', (error) => {
            logger.error('WebSocket error occurred', { projectId, error: error.message });
            gateway.disconnect(projectId, ws);
        });
    }

    server.listen(config.port, () => logger.info('Server is listening', { port: config.port }));

    const shutdown = (signal: string) => {
        logger.info('Shutting down', { signal });
        streamManager.closeAll();
        wss.close();
        server.close(() => {
            sandbox
                .reset()
                .then(() => projectStore.close())
                .then(() => process.exit(0))
                .catch((error: unknown) => {
                    logger.error('Shutdown failed', { error: errorMessage(error) });
                    process.exit(1);
                });
        });
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
    const fallback = winston.createLogger({ transports: [new winston.transports.Console()] });
    fallback.error('Startup failed', { error: errorMessage(error) });
    process.exit(1);
});
