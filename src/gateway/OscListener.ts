import { scoped } from '../logging.js';
import type { OscIngressConfig } from '../types/config.js';
import type { RawPacket } from '../types/osc.js';
import type { DisplayStateCell } from './DisplayState.js';
import { mapMessage } from './FieldMapper.js';
import { decodeOscPacket, describeArgument } from './OscDecoder.js';
import { PacketSource } from './PacketSource.js';

const log = scoped('osc-listener');

export type ListenerStatus = 'starting' | 'running' | 'stopping' | 'stopped';

export type ListenerStats = {
  received: number;
  applied: number;
  ignored: number;
  malformed: number;
  unsupported: number;
  /** Datagrams lost to receive-queue overflow. */
  dropped: number;
  /** Epoch ms of the last datagram, null before the first. */
  lastPacketAt: number | null;
};

export type ListenerOptions = OscIngressConfig & {
  state: DisplayStateCell;
  now?: () => number;
};

/**
 * Lifecycle token for a running listener. Only the listener writes to the
 * display state; the handle exposes status, counters and stop().
 */
export class ListenerHandle {
  private statusValue: ListenerStatus = 'starting';
  private readonly counters: Omit<ListenerStats, 'dropped'> = {
    received: 0,
    applied: 0,
    ignored: 0,
    malformed: 0,
    unsupported: 0,
    lastPacketAt: null,
  };
  private markClosed: () => void = () => undefined;
  private readonly closedPromise = new Promise<void>((resolve) => {
    this.markClosed = resolve;
  });

  constructor(
    private readonly source: PacketSource,
    private readonly state: DisplayStateCell,
    private readonly now: () => number,
  ) {}

  get status(): ListenerStatus {
    return this.statusValue;
  }

  /** Bound UDP port. */
  get port(): number {
    return this.source.port();
  }

  /** Socket error that ended the loop, if it did not end through stop(). */
  get failure(): Error | undefined {
    return this.source.failure;
  }

  /** Settles once the loop has exited and the socket is released. */
  get closed(): Promise<void> {
    return this.closedPromise;
  }

  stats(): ListenerStats {
    return { ...this.counters, dropped: this.source.dropped };
  }

  /** Bind and begin the receive loop. Rejects with StartupError. */
  async start(): Promise<void> {
    if (this.statusValue !== 'starting') throw new Error(`listener already ${this.statusValue}`);
    try {
      await this.source.bind();
    } catch (err) {
      this.statusValue = 'stopped';
      this.markClosed();
      throw err;
    }
    this.statusValue = 'running';
    void this.run();
  }

  /** Unblock the pending receive, release the socket and wait for the loop. Idempotent. */
  async stop(): Promise<void> {
    if (this.statusValue === 'running') {
      this.statusValue = 'stopping';
      log.info({ port: this.port }, 'stopping OSC listener');
    }
    await this.source.close();
    await this.closedPromise;
  }

  private async run(): Promise<void> {
    for (;;) {
      const packet = await this.source.receive();
      if (!packet) break;
      try {
        this.ingest(packet);
      } catch (err) {
        log.error({ err, from: packet.sender.address }, 'packet handling threw');
      }
    }
    await this.source.close();
    if (this.source.failure) {
      log.error({ err: this.source.failure }, 'OSC listener stopped by socket error');
    } else {
      log.info(this.stats(), 'OSC listener stopped');
    }
    this.statusValue = 'stopped';
    this.markClosed();
  }

  private ingest(packet: RawPacket): void {
    this.counters.received += 1;
    this.counters.lastPacketAt = this.now();
    const from = `${packet.sender.address}:${packet.sender.port}`;

    const decoded = decodeOscPacket(packet.data);
    if (!decoded.ok) {
      const { error } = decoded;
      if (error.kind === 'malformed') {
        this.counters.malformed += 1;
        log.warn({ from, offset: error.offset, reason: error.message }, 'dropped malformed OSC packet');
      } else {
        this.counters.unsupported += 1;
        log.info({ from, reason: error.message }, 'dropped unsupported OSC packet');
      }
      return;
    }

    const { message } = decoded;
    const update = mapMessage(message);
    if (!update) {
      this.counters.ignored += 1;
      log.debug(
        { from, address: message.address, args: message.args.slice(0, 8).map(describeArgument) },
        'ignored OSC message',
      );
      return;
    }
    this.state.apply(update);
    this.counters.applied += 1;
    log.debug({ from, field: update.field, value: update.value }, 'display updated');
  }
}

/** Bind the configured port and start feeding `options.state`. */
export async function startListener(options: ListenerOptions): Promise<ListenerHandle> {
  const { host, port, queueLimit, state, now = Date.now } = options;
  const handle = new ListenerHandle(new PacketSource({ host, port, queueLimit }), state, now);
  await handle.start();
  log.info({ host, port: handle.port }, 'OSC listener running');
  return handle;
}

export function stopListener(handle: ListenerHandle): Promise<void> {
  return handle.stop();
}
