#!/usr/bin/env node

import readline from 'readline';
import axios from 'axios';
import WebSocket from 'ws';
import { formatChunk } from './cliFormat';
import { StreamChunk } from './services/stream/types';

// Usage: pipeline-pilot-cli [server-url] [project-id]
const serverUrl = (process.argv[2] || 'http://localhost:8080').replace(/\/$/, '');
const wsBase = serverUrl.replace(/^http/, 'ws');

async function resolveProjectId(): Promise<string> {
    if (process.argv[3]) return process.argv[3];
    const { data } = await axios.post<{ id: string }>(`${serverUrl}/api/projects`, { title: 'CLI session' });
    return data.id;
}

function isStreamChunk(value: unknown): value is StreamChunk {
    return typeof value === 'object' && value !== null && 'type' in value && 'projectId' in value;
}

async function main(): Promise<void> {
    const projectId = await resolveProjectId();
    const ws = new WebSocket(`${wsBase}/${encodeURIComponent(projectId)}`);
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: 'YOU> ' });

    console.log(`Project: ${projectId}`);
    console.log('Type a request and press Enter. "/cancel" stops the running request, "/exit" quits.');

    ws.on('open', () => rl.prompt());

    ws.on('message', (data) => {
        let parsed: unknown;
        try {
            parsed = JSON.parse(data.toString());
        } catch {
            console.log(data.toString());
            return;
        }
        if (!isStreamChunk(parsed)) return;
        const line = formatChunk(parsed);
        if (line) console.log(line);
        if (parsed.type === 'stream_end' || parsed.type === 'error' || parsed.type === 'connection_ack') rl.prompt();
    });

    ws.on('close', (code, reason) => {
        console.log(`\n[WebSocket closed] Code: ${code}, Reason: ${reason.toString() || 'N/A'}`);
        rl.close();
    });

    ws.on('error', (error) => {
        console.error(`\n[WebSocket error] ${error.message}`);
        rl.close();
    });

    rl.on('line', (line) => {
        const text = line.trim();
        if (text === '/exit') {
            ws.close();
            return;
        }
        if (ws.readyState !== WebSocket.OPEN) {
            console.log('[Info] WebSocket not open. Request not sent.');
            return;
        }
        if (text === '/cancel') {
            ws.send(JSON.stringify({ type: 'cancel' }));
            return;
        }
        if (text) ws.send(JSON.stringify({ type: 'user_turn', text }));
    });

    rl.on('close', () => process.exit(0));
}

main().catch((error: unknown) => {
    console.error(`FATAL: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
});
