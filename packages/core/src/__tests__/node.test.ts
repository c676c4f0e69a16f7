import { EventEmitter } from 'node:events';
import { createConnection } from 'node:net';
import type { Socket } from 'node:net';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { TcpNodeProbe, isLocalNode, nodeLabel } from '../node.js';

vi.mock('node:net', () => ({ createConnection: vi.fn() }));

describe('isLocalNode', () => {
  it('matches the local id and its aliases', () => {
    expect(isLocalNode('test-host', 'test-host')).toBe(true);
    for (const alias of ['', '.', 'local', 'localhost']) expect(isLocalNode(alias, 'test-host')).toBe(true);
    expect(isLocalNode('node-a', 'test-host')).toBe(false);
  });
});

describe('nodeLabel', () => {
  it('names the empty identifier local', () => {
    expect(nodeLabel('')).toBe('local');
    expect(nodeLabel('.')).toBe('local');
    expect(nodeLabel('node-a')).toBe('node-a');
  });
});

function fakeSocket() {
  return Object.assign(new EventEmitter(), { destroy: vi.fn() });
}

describe('TcpNodeProbe', () => {
  let socket: ReturnType<typeof fakeSocket>;

  beforeEach(() => {
    socket = fakeSocket();
    vi.mocked(createConnection).mockReturnValue(socket as unknown as Socket);
  });

  afterEach(() => {
    vi.mocked(createConnection).mockReset();
  });

  it('treats this host as reachable without connecting', async () => {
    await expect(new TcpNodeProbe(22, 100, 'test-host').isReachable('test-host')).resolves.toBe(true);
    expect(createConnection).not.toHaveBeenCalled();
  });

  it('reports a node reachable once the connection opens', async () => {
    const pending = new TcpNodeProbe(22, 100, 'test-host').isReachable('node-a');
    socket.emit('connect');
    await expect(pending).resolves.toBe(true);
    expect(socket.destroy).toHaveBeenCalled();
    expect(createConnection).toHaveBeenCalledWith({ host: 'node-a', port: 22, timeout: 100, signal: undefined });
  });

  it.each(['error', 'timeout'])('reports a node unreachable on %s', async (event) => {
    const pending = new TcpNodeProbe(2222, 100, 'test-host').isReachable('node-b');
    socket.emit(event, new Error('refused'));
    await expect(pending).resolves.toBe(false);
  });
});
