import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { WebSocketServer, type WebSocket } from 'ws';
import { ConnectionError, TransportClosedError } from '@agent-mesh/utils/errors';
import { openWebSocketTransport, type Transport } from './transport.js';
import { NetworkConnector } from './connector.js';

function portOf(server: WebSocketServer): number {
  const address = server.address();
  if (typeof address === 'string') {
    throw new Error(`Expected a TCP address, got ${address}`);
  }
  return address.port;
}

describe('WebSocketTransport', () => {
  let server: WebSocketServer;
  let url: string;
  let peers: WebSocket[];

  beforeEach(async () => {
    peers = [];
    server = new WebSocketServer({ host: '127.0.0.1', port: 0 });
    server.on('connection', (ws) => peers.push(ws));
    await new Promise<void>((resolve) => server.once('listening', () => resolve()));
    url = `ws://127.0.0.1:${portOf(server)}`;
  });

  afterEach(async () => {
    for (const peer of peers) peer.terminate();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  async function openWithPeer(): Promise<{ transport: Transport; peer: WebSocket }> {
    const transport = await openWebSocketTransport(url, { timeoutMs: 2000 });
    await vi.waitFor(() => expect(peers).toHaveLength(1));
    return { transport, peer: peers[0] };
  }

  it('sends text frames to the peer', async () => {
    const { transport, peer } = await openWithPeer();
    const received = new Promise<string>((resolve) => peer.once('message', (data) => resolve(String(data))));

    await transport.send('{"type":"system_request","command":"list_agents"}');

    expect(await received).toBe('{"type":"system_request","command":"list_agents"}');
    await transport.close();
  });

  it('buffers frames until they are received, in order', async () => {
    const { transport, peer } = await openWithPeer();

    peer.send('first');
    peer.send('second');

    expect(await transport.receive()).toBe('first');
    expect(await transport.receive()).toBe('second');
    await transport.close();
  });

  it('rejects pending receives with TransportClosedError when the peer closes', async () => {
    const { transport, peer } = await openWithPeer();
    const pending = transport.receive();

    peer.close(1000);

    await expect(pending).rejects.toBeInstanceOf(TransportClosedError);
    expect(transport.isOpen).toBe(false);
  });

  it('rejects sends after close', async () => {
    const { transport } = await openWithPeer();

    await transport.close();
    await transport.close();

    await expect(transport.send('late')).rejects.toBeInstanceOf(TransportClosedError);
  });

  it('fails to open when nothing is listening', async () => {
    const port = portOf(server);
    await new Promise<void>((resolve) => server.close(() => resolve()));
    server = new WebSocketServer({ noServer: true });

    await expect(openWebSocketTransport(`ws://127.0.0.1:${port}`, { timeoutMs: 2000 })).rejects.toBeInstanceOf(
      ConnectionError
    );
  });

  it('carries a full connector handshake', async () => {
    server.on('connection', (ws) => {
      ws.once('message', (data) => {
        const request = JSON.parse(String(data));
        ws.send(
          JSON.stringify({
            type: 'system_response',
            command: request.command,
            success: request.agent_id === 'A1',
            network_name: 'LoopbackNet',
          })
        );
      });
    });
    const port = portOf(server);
    const connector = new NetworkConnector({ host: '127.0.0.1', port, agentId: 'A1' });

    expect(await connector.connect()).toBe(true);
    expect(connector.networkName).toBe('LoopbackNet');

    expect(await connector.disconnect()).toBe(true);
    expect(await connector.waitUntilClosed()).toBe('closed');
  });
});
