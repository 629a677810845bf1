import type { IncomingMessage } from 'http';
import type { Duplex } from 'stream';
import { HijackUnsupportedError } from '../errors';

export interface HijackedConnection {
  socket: Duplex;
  // Bytes the server already read past the request head
  head: Buffer;
}

/**
 * A client connection as seen by the tunnel. Transports that can hand over
 * the raw socket report it through canHijack(); the rest refuse hijack().
 */
export interface ClientTransport {
  readonly request: IncomingMessage;
  canHijack(): boolean;
  hijack(): HijackedConnection;
}

// Built from an http.Server 'upgrade' event, where the socket is already detached.
export class UpgradeTransport implements ClientTransport {
  readonly request: IncomingMessage;
  private socket: Duplex;
  private head: Buffer;
  private hijacked = false;

  constructor(request: IncomingMessage, socket: Duplex, head: Buffer = Buffer.alloc(0)) {
    this.request = request;
    this.socket = socket;
    this.head = head;
  }

  canHijack(): boolean {
    return !this.hijacked;
  }

  isHijacked(): boolean {
    return this.hijacked;
  }

  hijack(): HijackedConnection {
    if (this.hijacked) {
      throw new HijackUnsupportedError('connection has already been hijacked');
    }
    this.hijacked = true;
    return { socket: this.socket, head: this.head };
  }
}

// Ordinary request/response exchange; the server's response owns the socket.
export class ResponseTransport implements ClientTransport {
  readonly request: IncomingMessage;

  constructor(request: IncomingMessage) {
    this.request = request;
  }

  canHijack(): boolean {
    return false;
  }

  hijack(): HijackedConnection {
    throw new HijackUnsupportedError();
  }
}

// Request line and raw headers exactly as the client sent them.
export function serializeRequestHead(req: IncomingMessage, path = req.url ?? '/'): Buffer {
  const lines = [`${req.method ?? 'GET'} ${path} HTTP/${req.httpVersion}`];
  for (let i = 0; i + 1 < req.rawHeaders.length; i += 2) {
    lines.push(`${req.rawHeaders[i]}: ${req.rawHeaders[i + 1]}`);
  }
  return Buffer.from(`${lines.join('\r\n')}\r\n\r\n`, 'latin1');
}
