import net from 'net';
import tls from 'tls';
import { DialError } from '../errors';

export interface DialTarget {
  host: string;
  port: number;
  tls: boolean;
}

export interface DialOptions {
  // Verify the upstream certificate on TLS dials (default: true)
  verifyUpstreamTLS?: boolean;
  // Extra trust anchors for the upstream certificate
  ca?: string | Buffer | Array<string | Buffer>;
}

export function dialTarget(location: URL): DialTarget {
  const plain = location.protocol === 'http:';
  return {
    host: location.hostname.replace(/^\[(.*)\]$/, '$1'),
    port: location.port ? Number(location.port) : (plain ? 80 : 443),
    tls: !plain
  };
}

export function dialAddress(location: URL): string {
  const { host, port } = dialTarget(location);
  return net.isIPv6(host) ? `[${host}]:${port}` : `${host}:${port}`;
}

// Dials the upstream endpoint, plain TCP for http: and TLS for anything else.
export function dialUpstream(location: URL, options: DialOptions = {}): Promise<net.Socket> {
  const target = dialTarget(location);
  const address = dialAddress(location);

  return new Promise((resolve, reject) => {
    const socket = target.tls
      ? tls.connect({
        host: target.host,
        port: target.port,
        servername: net.isIP(target.host) ? undefined : target.host,
        rejectUnauthorized: options.verifyUpstreamTLS ?? true,
        ca: options.ca
      })
      : net.connect({ host: target.host, port: target.port });

    const onError = (err: Error) => {
      socket.destroy();
      reject(new DialError(address, err));
    };
    socket.once('error', onError);
    socket.once(target.tls ? 'secureConnect' : 'connect', () => {
      socket.removeListener('error', onError);
      resolve(socket);
    });
  });
}
