import { EventEmitter } from 'events';
import type { Duplex } from 'stream';
import { pipeline } from 'stream/promises';
import { HandshakeError, HijackUnsupportedError } from '../errors';
import { dialAddress, dialUpstream, type DialOptions } from './dial';
import { serializeRequestHead, type ClientTransport } from './transport';

export type RelayDirection = 'outgoing' | 'incoming';

export class TunnelSession extends EventEmitter {
  id: number;
  incoming: string;
  upstream: string;
  bytesIn: number;
  bytesOut: number;

  constructor(info: Pick<TunnelSession, 'id' | 'incoming' | 'upstream'>) {
    super();
    this.id = info.id;
    this.incoming = info.incoming;
    this.upstream = info.upstream;
    this.bytesIn = 0;
    this.bytesOut = 0;
  }

  toJSON(): Pick<TunnelSession, 'id' | 'incoming' | 'upstream' | 'bytesIn' | 'bytesOut'> {
    return {
      id: this.id,
      incoming: this.incoming,
      upstream: this.upstream,
      bytesIn: this.bytesIn,
      bytesOut: this.bytesOut
    };
  }
}

export interface TunnelOptions extends DialOptions {
  // Request target written to the upstream; defaults to the client's
  path?: string;
  // Called once the client connection is taken over, before any bytes move
  onSession?: (session: TunnelSession) => void;
}

let tunnelIdCounter = 0;

// Resolves once the data is flushed; rejects if the socket errors or closes first
function writeAll(socket: Duplex, data: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => settle(err);
    const onClose = () => settle(new Error('connection closed during handshake'));
    const settle = (err?: Error | null) => {
      socket.removeListener('error', onError);
      socket.removeListener('close', onClose);
      if (err) {
        reject(err);
      } else {
        resolve();
      }
    };
    socket.once('error', onError);
    socket.once('close', onClose);
    socket.write(data, settle);
  });
}

function copy(src: Duplex, dest: Duplex, count: (bytes: number) => void): Promise<void> {
  const done = pipeline(src, dest);
  src.on('data', (chunk: Buffer) => count(chunk.length));
  return done;
}

/**
 * Takes over the client connection and bridges it to a freshly dialed
 * upstream connection until both directions have finished.
 *
 * The client's request head is replayed to the upstream first so it runs
 * its own upgrade handshake; if that fails the call rejects with a
 * `HandshakeError`. Both sockets are destroyed on every exit path and
 * `tunnelClosed` fires once the session has been announced. Nothing is retried.
 */
export async function tunnel(transport: ClientTransport, upstream: URL, options: TunnelOptions = {}): Promise<TunnelSession> {
  if (!transport.canHijack()) {
    throw new HijackUnsupportedError();
  }

  const upstreamConn = await dialUpstream(upstream, options);
  const address = dialAddress(upstream);
  let clientConn: Duplex | undefined;
  let session: TunnelSession | undefined;

  // Until the relay pipelines attach, a failure on either socket tears down
  // both; the pending handshake write then rejects.
  let upstreamError: Error | undefined;
  upstreamConn.on('error', (err: Error) => {
    upstreamError ??= err;
    clientConn?.destroy();
  });

  try {
    const { socket, head } = transport.hijack();
    clientConn = socket;
    socket.on('error', () => upstreamConn.destroy());

    const req = transport.request;
    session = new TunnelSession({
      id: ++tunnelIdCounter,
      incoming: `${req.socket.remoteAddress}:${req.socket.remotePort}`,
      upstream: address
    });
    options.onSession?.(session);

    try {
      await writeAll(upstreamConn, serializeRequestHead(req, options.path));
      if (head.length > 0) {
        await writeAll(upstreamConn, head);
      }
    } catch (err) {
      throw new HandshakeError(address, upstreamError ?? err);
    }

    const current = session;
    const results = await Promise.allSettled([
      copy(socket, upstreamConn, (n) => { current.bytesIn += n; }),
      copy(upstreamConn, socket, (n) => { current.bytesOut += n; })
    ]);
    const directions: RelayDirection[] = ['outgoing', 'incoming'];
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        current.emit('relayError', directions[i], result.reason);
      }
    });

    return current;
  } finally {
    upstreamConn.destroy();
    clientConn?.destroy();
    session?.emit('tunnelClosed');
  }
}
