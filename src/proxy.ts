import http, { type IncomingMessage } from 'http';
import https from 'https';
import type { AddressInfo } from 'net';
import type { Duplex } from 'stream';
import { EventEmitter, once } from 'events';
import { tunnel, UpgradeTransport, type DialOptions, type TunnelSession } from './tunnel';
import type { SessionVerification } from './session/verifier';
import type { TrustedCertificate } from './trust';

export type UpgradeAuthorizer = (req: IncomingMessage) => Promise<SessionVerification>;

export interface UpgradeProxyConfig extends DialOptions {
  upstream: URL;
  authorize?: UpgradeAuthorizer;
  // Terminate TLS with this identity instead of serving plain HTTP
  certificate?: TrustedCertificate;
}

export interface ListenOptions {
  port: number;
  host?: string;
}

function remoteAddress(req: IncomingMessage): string {
  return `${req.socket.remoteAddress}:${req.socket.remotePort}`;
}

function writeStatus(socket: Duplex, status: number, reason: string): void {
  socket.end(`HTTP/1.1 ${status} ${reason}\r\nConnection: close\r\nContent-Length: 0\r\n\r\n`);
}

/**
 * Front end that accepts upgrade requests, checks the session and tunnels
 * each accepted connection to the upstream. Plain requests get a 426.
 */
export class UpgradeProxy extends EventEmitter {
  srv: http.Server;
  private config: UpgradeProxyConfig;
  private sockets = new Set<Duplex>();

  constructor(config: UpgradeProxyConfig) {
    super();
    this.config = config;
    this.srv = config.certificate
      ? https.createServer({ cert: config.certificate.cert, key: config.certificate.key })
      : http.createServer();

    this.srv.on('request', (req: IncomingMessage, res: http.ServerResponse) => {
      this.emit('plainRequest', remoteAddress(req), req.method, req.url);
      res.writeHead(426, { connection: 'close', 'content-type': 'text/plain' });
      res.end('upgrade required\n');
    });

    this.srv.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      this.sockets.add(socket);
      socket.on('close', () => this.sockets.delete(socket));
      socket.on('error', (err: Error) => {
        this.emit('connectionError', remoteAddress(req), err);
        socket.destroy();
      });
      this.handleUpgrade(req, socket, head).catch((err: unknown) => {
        this.emit('tunnelError', remoteAddress(req), err);
        socket.destroy();
      });
    });
  }

  async listen(options: ListenOptions): Promise<void> {
    this.srv.listen(options.port, options.host);
    await once(this.srv, 'listening');
  }

  address(): AddressInfo | string | null {
    return this.srv.address();
  }

  async close(): Promise<void> {
    for (const socket of this.sockets) {
      socket.destroy();
    }
    this.sockets.clear();
    this.srv.closeAllConnections();
    await new Promise<void>((resolve, reject) =>
      this.srv.close((err) => (err ? reject(err) : resolve()))
    );
  }

  private async handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): Promise<void> {
    const remote = remoteAddress(req);

    if (this.config.authorize) {
      const verdict = await this.config.authorize(req);
      if (!verdict.authenticated) {
        this.emit('unauthorized', remote, verdict.reason);
        writeStatus(socket, 401, 'Unauthorized');
        return;
      }
      this.emit('authorized', remote, verdict.subject);
    }

    const transport = new UpgradeTransport(req, socket, head);
    try {
      await tunnel(transport, this.config.upstream, {
        verifyUpstreamTLS: this.config.verifyUpstreamTLS,
        ca: this.config.ca,
        onSession: (session: TunnelSession) => this.emit('newTunnel', session)
      });
    } catch (err) {
      this.emit('tunnelError', remote, err);
      if (!transport.isHijacked()) {
        writeStatus(socket, 502, 'Bad Gateway');
      }
    }
  }
}
