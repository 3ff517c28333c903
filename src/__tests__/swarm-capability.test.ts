/**
 * Tests for the Hyperswarm capability against an in-process swarm
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, mkdir, readFile, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import type { Duplex } from 'stream';
import { SwarmCapability, discoveryTopic } from '../transport/swarm.js';
import { PeerSession, type ReceivedFile } from '../transport/session.js';
import { computeFingerprint } from '../identity/index.js';
import { resolveShareConfig } from '../config.js';
import type { PeerRecord, ShareConfig } from '../types.js';
import { FakeSwarm } from './helpers/fake-swarm.js';
import { createDuplexPair } from './helpers/duplex-pair.js';
import { descriptorFor } from './helpers/memory-capability.js';

vi.mock('hyperswarm', async () => {
  const { FakeSwarm: Swarm } = await import('./helpers/fake-swarm.js');
  return { default: Swarm };
});

const REMOTE_KEY = Buffer.alloc(32, 7);
const REMOTE_FP = computeFingerprint(REMOTE_KEY.toString('hex'));
const REMOTE_ADDRESS = { host: '192.168.1.20', port: 49737 };

describe('discoveryTopic', () => {
  it('should derive a 32-byte topic per name', () => {
    expect(discoveryTopic('lanshare')).toHaveLength(32);
    expect(discoveryTopic('lanshare').equals(discoveryTopic('lanshare'))).toBe(true);
    expect(discoveryTopic('lanshare').equals(discoveryTopic('office'))).toBe(false);
  });
});

describe('SwarmCapability', () => {
  let tempDir: string;
  let config: ShareConfig;
  let capability: SwarmCapability;
  let sockets: Duplex[];

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'swarm-test-'));
    config = resolveShareConfig({
      configDir: join(tempDir, 'config'),
      downloadDir: join(tempDir, 'downloads'),
      alias: 'Laptop',
      deviceModel: 'ThinkPad',
    });
    sockets = [];
    capability = await SwarmCapability.create(config);
    await capability.start();
  });

  afterEach(async () => {
    await capability.stop();
    for (const socket of sockets) socket.destroy();
    await rm(tempDir, { recursive: true, force: true });
  });

  /**
   * Connect a remote PeerSession and wait until both sides saw HELLO
   */
  async function connectRemote(announcedFingerprint = REMOTE_FP) {
    const [local, remote] = createDuplexPair();
    sockets.push(local, remote);
    const remoteDownloads = join(tempDir, 'remote-downloads');
    const session = new PeerSession(remote, descriptorFor(announcedFingerprint, 'Phone'), {
      downloadDir: remoteDownloads,
      acceptIncoming: true,
      transferTimeoutMs: 5000,
    });
    session.start();

    FakeSwarm.latest().connect(local, REMOTE_KEY, REMOTE_ADDRESS);
    await vi.waitFor(async () => {
      expect(session.remoteDescriptor).not.toBeNull();
      expect((await capability.listPeers()).has(REMOTE_FP)).toBe(true);
    });
    return { session, socket: remote, remoteDownloads };
  }

  async function recordFor(fingerprint: string): Promise<PeerRecord> {
    const entry = (await capability.listPeers()).get(fingerprint);
    if (!entry) throw new Error(`Peer ${fingerprint} is not live`);
    return { fingerprint, ...entry };
  }

  it('should join the discovery topic as client and server', () => {
    const swarm = FakeSwarm.latest();

    expect(swarm.joined).toHaveLength(1);
    expect(swarm.joined[0]?.topic.equals(discoveryTopic('lanshare'))).toBe(true);
    expect(swarm.joined[0]).toMatchObject({ client: true, server: true });
  });

  it('should seed the swarm key pair from the device identity', async () => {
    const swarm = FakeSwarm.latest();
    const identity: { privateKey: string } = JSON.parse(await readFile(join(tempDir, 'config', 'identity.json'), 'utf-8'));

    expect(swarm.options.seed?.toString('hex')).toBe(identity.privateKey);
    expect(swarm.options.firewall?.(REMOTE_KEY)).toBe(false);
  });

  it('should announce its descriptor', async () => {
    const { session } = await connectRemote();

    expect(session.remoteDescriptor).toEqual({
      alias: 'Laptop',
      version: '1.0',
      deviceModel: 'ThinkPad',
      deviceType: 'desktop',
      fingerprint: capability.descriptor.fingerprint,
      port: 0,
      protocol: 'swarm',
      download: false,
    });
  });

  it('should list a connected peer under its key fingerprint', async () => {
    await connectRemote();

    const peers = await capability.listPeers();
    expect(Array.from(peers.keys())).toEqual([REMOTE_FP]);
    expect(peers.get(REMOTE_FP)).toEqual({
      address: REMOTE_ADDRESS,
      descriptor: descriptorFor(REMOTE_FP, 'Phone'),
    });
  });

  it('should trust the key over an announced fingerprint', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    await connectRemote('f'.repeat(64));

    const peers = await capability.listPeers();
    expect(peers.get(REMOTE_FP)?.descriptor.fingerprint).toBe(REMOTE_FP);
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });

  it('should drop a peer when its connection closes', async () => {
    const { socket } = await connectRemote();

    socket.destroy();

    await vi.waitFor(async () => expect((await capability.listPeers()).size).toBe(0));
  });

  it('should push a file to a connected peer', async () => {
    const { remoteDownloads } = await connectRemote();
    const source = join(tempDir, 'report.txt');
    await writeFile(source, 'quarterly numbers');

    await capability.sendFile(await recordFor(REMOTE_FP), source);

    expect(await readFile(join(remoteDownloads, 'report.txt'), 'utf-8')).toBe('quarterly numbers');
  });

  it('should refuse to push to a peer that is not connected', async () => {
    const record: PeerRecord = {
      fingerprint: 'gone',
      address: { host: '192.168.1.10', port: 53317 },
      descriptor: descriptorFor('gone', 'Tablet'),
    };

    await expect(capability.sendFile(record, '/tmp/x.txt')).rejects.toMatchObject({
      code: 'PEER_UNREACHABLE',
      message: 'Peer Tablet (192.168.1.10:53317) is not connected',
    });
  });

  it('should store files pushed by a peer and report them', async () => {
    const { session } = await connectRemote();
    const received: ReceivedFile[] = [];
    capability.on('file', (file: ReceivedFile) => received.push(file));
    const outbox = join(tempDir, 'outbox');
    await mkdir(outbox);
    await writeFile(join(outbox, 'song.mp3'), 'la la la');

    await session.sendFile(join(outbox, 'song.mp3'));

    expect(received).toHaveLength(1);
    expect(received[0]?.path).toBe(join(tempDir, 'downloads', 'song.mp3'));
    expect(received[0]?.from?.alias).toBe('Phone');
    expect(await readFile(join(tempDir, 'downloads', 'song.mp3'), 'utf-8')).toBe('la la la');
  });

  it('should close sessions and destroy the swarm on stop', async () => {
    const { session } = await connectRemote();
    const swarm = FakeSwarm.latest();

    await capability.stop();

    expect(swarm.destroyed).toBe(true);
    expect((await capability.listPeers()).size).toBe(0);
    await vi.waitFor(() => expect(session.closed).toBe(true));
  });
});
