import { EventEmitter } from 'events';
import { describe, expect, it } from 'vitest';
import { createNullLogger } from '../../utils/logger';
import { Turn } from '../../models/project.model';
import { StreamManager } from './StreamManager';
import { clientMessageSchema, StreamSocket } from './types';

class FakeSocket implements StreamSocket {
  readyState = 1;
  sent: string[] = [];
  terminated = false;

  send(data: string): void {
    this.sent.push(data);
  }

  terminate(): void {
    this.terminated = true;
    this.readyState = 3;
  }
}

describe('StreamManager', () => {
  it('broadcasts to every open client of a project', () => {
    const manager = new StreamManager({ logger: createNullLogger() });
    const a = new FakeSocket();
    const b = new FakeSocket();
    const closed = new FakeSocket();
    const other = new FakeSocket();
    closed.readyState = 3;
    manager.addConnection('p1', a);
    manager.addConnection('p1', b);
    manager.addConnection('p1', closed);
    manager.addConnection('p2', other);

    manager.sendChunk('p1', { type: 'stream_end', projectId: 'p1', content: { appended: 2 } });

    const expected = '{"type":"stream_end","projectId":"p1","content":{"appended":2}}';
    expect(a.sent).toEqual([expected]);
    expect(b.sent).toEqual([expected]);
    expect(closed.sent).toEqual([]);
    expect(other.sent).toEqual([]);
  });

  it('drops a client whose send throws', () => {
    const manager = new StreamManager({ logger: createNullLogger() });
    const broken = new FakeSocket();
    broken.send = () => {
      throw new Error('socket gone');
    };
    manager.addConnection('p1', broken);

    manager.sendChunk('p1', { type: 'stream_end', projectId: 'p1', content: { appended: 0 } });

    expect(broken.terminated).toBe(true);
    expect(manager.connectionCount('p1')).toBe(0);
  });

  it('forwards loop events', () => {
    const manager = new StreamManager({ logger: createNullLogger() });
    const loop = new EventEmitter();
    const socket = new FakeSocket();
    manager.addConnection('p1', socket);
    manager.attach(loop);

    const turn: Turn = {
      sequence: 1,
      projectId: 'p1',
      role: 'user',
      content: { kind: 'text', text: 'load the data' },
      timestamp: '2026-01-01T00:00:00.000Z',
    };
    loop.emit('state', { projectId: 'p1', from: 'AwaitingUser', to: 'ModelThinking' });
    loop.emit('turn', turn);
    loop.emit('turn', { ...turn, projectId: 'p2' });

    expect(socket.sent.map((s) => JSON.parse(s))).toEqual([
      { type: 'state', projectId: 'p1', content: { projectId: 'p1', from: 'AwaitingUser', to: 'ModelThinking' } },
      { type: 'turn', projectId: 'p1', content: turn },
    ]);
  });

  it('forgets a project once its last client leaves', () => {
    const manager = new StreamManager({ logger: createNullLogger() });
    const socket = new FakeSocket();
    manager.addConnection('p1', socket);

    expect(manager.removeConnection('p1', socket)).toBe(true);
    expect(manager.removeConnection('p1', socket)).toBe(false);
    expect(manager.connectionCount('p1')).toBe(0);
  });
});

describe('clientMessageSchema', () => {
  it('accepts user turns and cancels', () => {
    expect(clientMessageSchema.parse({ type: 'user_turn', text: '  impute it ' })).toEqual({
      type: 'user_turn',
      text: 'impute it',
    });
    expect(clientMessageSchema.parse({ type: 'cancel' })).toEqual({ type: 'cancel' });
  });

  it('rejects empty text', () => {
    expect(clientMessageSchema.safeParse({ type: 'user_turn', text: '   ' }).success).toBe(false);
  });
});
