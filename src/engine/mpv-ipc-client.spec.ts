import { once } from 'events';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { EngineCommandFailedError } from '../common/errors';
import { FakeMpvServer } from '../testing/mpv-server.fixture';
import { MpvEventMessage, MpvIpcClient, parseMpvMessage } from './mpv-ipc-client';

const OPTIONS = { timeoutMs: 1000, pollMs: 10, requestTimeoutMs: 200 };

describe('parseMpvMessage', () => {
  it('parses events', () => {
    expect(parseMpvMessage('{"event":"end-file","reason":"eof","playlist_entry_id":1}')).toEqual({
      type: 'event',
      event: { event: 'end-file', reason: 'eof' },
    });
    expect(parseMpvMessage('{"event":"property-change","id":1,"name":"pause","data":true}')).toEqual({
      type: 'event',
      event: { event: 'property-change', id: 1, name: 'pause', data: true },
    });
  });

  it('parses responses', () => {
    expect(parseMpvMessage('{"request_id":7,"error":"success","data":42}')).toEqual({
      type: 'response',
      response: { requestId: 7, error: 'success', data: 42 },
    });
  });

  it('returns null for anything else', () => {
    expect(parseMpvMessage('not json')).toBeNull();
    expect(parseMpvMessage('"text"')).toBeNull();
    expect(parseMpvMessage('{"data":1}')).toBeNull();
  });
});

describe('MpvIpcClient', () => {
  let dir: string;
  let socketPath: string;
  let server: FakeMpvServer | null;
  let client: MpvIpcClient | null;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'scanplay-ipc-'));
    socketPath = path.join(dir, 'mpv.sock');
    server = null;
    client = null;
  });

  afterEach(async () => {
    client?.close();
    await server?.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const connect = async (): Promise<{ server: FakeMpvServer; client: MpvIpcClient }> => {
    const fake = await FakeMpvServer.listen(socketPath);
    server = fake;
    const connected = await MpvIpcClient.connect(socketPath, OPTIONS);
    client = connected;
    return { server: fake, client: connected };
  };

  it('waits for the socket to appear', async () => {
    const connecting = MpvIpcClient.connect(socketPath, OPTIONS);
    await new Promise((resolve) => setTimeout(resolve, 50));
    server = await FakeMpvServer.listen(socketPath);

    client = await connecting;

    expect(client.isOpen).toBe(true);
  });

  it('gives up when the socket never appears', async () => {
    await expect(MpvIpcClient.connect(socketPath, { ...OPTIONS, timeoutMs: 60 })).rejects.toThrow(
      `control socket ${socketPath} not ready after 60ms`,
    );
  });

  it('stops waiting when aborted', async () => {
    const controller = new AbortController();
    const connecting = MpvIpcClient.connect(socketPath, OPTIONS);
    const aborted = MpvIpcClient.connect(socketPath, { ...OPTIONS, signal: controller.signal });
    controller.abort();

    await expect(aborted).rejects.toThrow('engine process exited before its control socket was ready');
    server = await FakeMpvServer.listen(socketPath);
    client = await connecting;
  });

  it('matches replies to requests by request_id', async () => {
    const { server: fake, client: ipc } = await connect();
    fake.reply = (command) => ({ error: 'success', data: command[1] === 'volume' ? 55 : null });

    await expect(ipc.request(['get_property', 'volume'])).resolves.toBe(55);
    await expect(ipc.request(['cycle', 'pause'])).resolves.toBeNull();

    expect(fake.requests).toEqual([
      { command: ['get_property', 'volume'], request_id: 1 },
      { command: ['cycle', 'pause'], request_id: 2 },
    ]);
  });

  it('rejects when mpv reports an error', async () => {
    const { server: fake, client: ipc } = await connect();
    fake.reply = () => ({ error: 'property not found' });

    const request = ipc.request(['get_property', 'nope']);

    await expect(request).rejects.toBeInstanceOf(EngineCommandFailedError);
    await expect(request).rejects.toThrow('property not found');
  });

  it('rejects a request that is never answered', async () => {
    const { server: fake, client: ipc } = await connect();
    fake.reply = () => null;

    await expect(ipc.request(['cycle', 'mute'])).rejects.toThrow('mpv did not answer ["cycle","mute"] within 200ms');
  });

  it('emits events, including ones split across chunks', async () => {
    const { server: fake, client: ipc } = await connect();
    const events: MpvEventMessage[] = [];
    const second = new Promise<void>((resolve) => {
      ipc.on('event', (event: MpvEventMessage) => {
        events.push(event);
        if (events.length === 2) resolve();
      });
    });

    fake.write('{"event":"file-loaded"}\n{"event":"end-');
    fake.write('file","reason":"eof"}\n');
    await second;

    expect(events).toEqual([{ event: 'file-loaded' }, { event: 'end-file', reason: 'eof' }]);
  });

  it('registers property observers', async () => {
    const { server: fake, client: ipc } = await connect();

    await ipc.observeProperty(1, 'pause');

    expect(fake.commands()).toEqual([['observe_property', 1, 'pause']]);
  });

  it('fails pending requests and emits close when mpv goes away', async () => {
    const { server: fake, client: ipc } = await connect();
    fake.reply = () => null;

    const request = ipc.request(['quit']);
    const closed = once(ipc, 'close');
    await fake.waitForRequest((command) => command[0] === 'quit');
    fake.disconnectClients();

    await expect(request).rejects.toThrow('mpv IPC socket closed');
    await closed;
    expect(ipc.isOpen).toBe(false);
    await expect(ipc.request(['stop'])).rejects.toThrow('mpv IPC socket is closed');
  });
});
