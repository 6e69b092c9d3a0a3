import { createSocket, type RemoteInfo, type Socket } from 'node:dgram';
import { Buffer } from 'node:buffer';
import { StartupError } from '../errors.js';
import { scoped } from '../logging.js';
import type { RawPacket } from '../types/osc.js';

const log = scoped('osc-source');

export type PacketSourceOptions = {
  host: string;
  /** 0 binds an ephemeral port; see {@link PacketSource.port}. */
  port: number;
  /** Datagrams held while the reader is busy; the oldest is dropped beyond this. */
  queueLimit: number;
};

/**
 * UDP socket exposed as a pull source. `receive()` suspends until a datagram
 * is available or the source is closed.
 */
export class PacketSource {
  private readonly socket: Socket;
  private readonly queue: RawPacket[] = [];
  private readonly waiters: Array<(packet: RawPacket | null) => void> = [];
  private boundPort?: number;
  private closed = false;
  private closing?: Promise<void>;
  private droppedCount = 0;
  private socketFailure?: Error;

  constructor(private readonly options: PacketSourceOptions) {
    this.socket = createSocket({ type: 'udp4', reuseAddr: false });
    this.socket.on('message', (msg: Buffer, rinfo: RemoteInfo) => this.onMessage(msg, rinfo));
  }

  /** Bind the socket. Rejects with StartupError; callers must not retry. */
  async bind(): Promise<void> {
    const { host, port } = this.options;
    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error): void => {
        this.socket.off('listening', onListening);
        reject(new StartupError({ host, port, cause: err }));
      };
      const onListening = (): void => {
        this.socket.off('error', onError);
        this.boundPort = this.socket.address().port;
        this.socket.on('error', (err) => this.onSocketError(err));
        resolve();
      };
      this.socket.once('error', onError);
      this.socket.once('listening', onListening);
      try {
        this.socket.bind({ port, address: host });
      } catch (err) {
        // ERR_SOCKET_BAD_PORT and friends throw synchronously
        this.socket.off('error', onError);
        this.socket.off('listening', onListening);
        reject(new StartupError({ host, port, cause: err }));
      }
    }).catch(async (err: unknown) => {
      await this.close();
      throw err;
    });
    log.info({ host, port: this.port() }, 'OSC socket bound');
  }

  /** Next datagram in arrival order, or null once closed. */
  receive(): Promise<RawPacket | null> {
    const next = this.queue.shift();
    if (next) return Promise.resolve(next);
    if (this.closed) return Promise.resolve(null);
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  /** Release the socket and wake every pending receive(). Idempotent. */
  close(): Promise<void> {
    if (this.closing) return this.closing;
    this.closed = true;
    this.queue.length = 0;
    for (const wake of this.waiters.splice(0)) wake(null);
    this.closing = new Promise<void>((resolve) => {
      try {
        this.socket.close(() => resolve());
      } catch (err) {
        // ERR_SOCKET_DGRAM_NOT_RUNNING: the handle is already gone
        log.debug({ err }, 'socket already closed');
        resolve();
      }
    });
    return this.closing;
  }

  /** Actual bound port (differs from the configured one when that was 0). */
  port(): number {
    return this.boundPort ?? this.options.port;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  /** Socket error that ended the source after a successful bind, if any. */
  get failure(): Error | undefined {
    return this.socketFailure;
  }

  private onMessage(msg: Buffer, rinfo: RemoteInfo): void {
    if (this.closed) return;
    const packet: RawPacket = {
      data: msg,
      sender: { address: rinfo.address, port: rinfo.port, family: rinfo.family },
    };
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(packet);
      return;
    }
    if (this.queue.length >= this.options.queueLimit) {
      this.queue.shift();
      this.droppedCount += 1;
      log.warn({ dropped: this.droppedCount }, 'receive queue full, dropped oldest datagram');
    }
    this.queue.push(packet);
  }

  private onSocketError(err: Error): void {
    log.error({ err }, 'OSC socket error, closing');
    this.socketFailure = err;
    void this.close();
  }
}
