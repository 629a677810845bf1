#!/usr/bin/env node
import { applyArgs, parseArgs, type ParsedArgs } from './args';
import { ProviderBootstrap } from './oidc';
import { loadConfig, parseListenAddress, type ProxyConfig } from './config';
import { UpgradeProxy } from './proxy';
import { SessionCodec } from './session/codec';
import { SessionVerifier } from './session/verifier';
import { loadCertificate, type TrustedCertificate } from './trust';
import type { TunnelSession, RelayDirection } from './tunnel';

function printUsage (): void {
  console.log(`usage: upgrade-gate --config <file> [options]

Options:
  --help, -h            Show this help message and exit
  --config <file>       Configuration file (.json, anything else is read as YAML)
  --listen <[host:]port>  Override the listen address
  --upstream <url>      Override the upstream url
  --ndjson              Output in newline-delimited JSON format
  --log-level <level>   Log level: 'debug' or 'info' (default: info)
`);
}

function utcnow (): string {
  return new Date().toISOString();
}

function errorMessage (err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function report (args: ParsedArgs, fields: Record<string, unknown> & { ev: string }, line: string): void {
  if (args.ndjson) {
    console.log(JSON.stringify({ ts: utcnow(), ...fields }));
  } else {
    console.log(line);
  }
}

async function run (args: ParsedArgs, config: ProxyConfig): Promise<void> {
  const debug = (fields: Record<string, unknown> & { ev: string }, line: string) => {
    if (args.logLevel === 'debug') {
      report(args, fields, `DEBUG: ${line}`);
    }
  };

  const codec = new SessionCodec(config.encryptionKey);

  let certificate: TrustedCertificate | undefined;
  if (config.tlsCertificate && config.tlsPrivateKey) {
    certificate = await loadCertificate(config.tlsCertificate, config.tlsPrivateKey);
    report(args, { ev: 'certificateLoaded', subject: certificate.leaf.subject, validTo: certificate.leaf.validTo },
      `Loaded certificate ${certificate.leaf.subject.replace(/\n/g, ', ')} (valid to ${certificate.leaf.validTo})`);
  }

  const bootstrap = new ProviderBootstrap({
    discoveryURL: config.discoveryUrl,
    clientID: config.clientId,
    clientSecret: config.clientSecret,
    redirectBase: config.redirectionUrl,
    scopes: config.scopes,
    skipTLSVerify: config.skipOpenidProviderTlsVerify,
    timeoutMs: config.discoveryTimeoutMs
  });

  bootstrap.on('discoveryAttempt', (url: string, attempt: number) => {
    report(args, { ev: 'discoveryAttempt', url, attempt },
      `Attempting to retrieve openid configuration from discovery url: ${url} (attempt ${attempt})`);
  });
  bootstrap.on('discoveryFailed', (url: string, attempt: number, err: unknown) => {
    report(args, { ev: 'discoveryFailed', url, attempt, err: errorMessage(err) },
      `Failed to get provider configuration from discovery url: ${url}, ${errorMessage(err)}`);
  });
  bootstrap.on('discoverySucceeded', (url: string) => {
    report(args, { ev: 'discoverySucceeded', url },
      `Successfully retrieved the openid configuration from the discovery url: ${url}`);
  });

  const { client } = await bootstrap.start();

  client.on('providerConfigSynced', () => {
    debug({ ev: 'providerConfigSynced', issuer: client.providerConfig().issuer }, 'Provider configuration refreshed');
  });
  client.on('providerConfigSyncFailed', (err: unknown) => {
    report(args, { ev: 'providerConfigSyncFailed', err: errorMessage(err) },
      `Failed to refresh provider configuration: ${errorMessage(err)}`);
  });

  const verifier = new SessionVerifier({ codec, verifier: client, cookieName: config.cookieName });

  const proxy = new UpgradeProxy({
    upstream: new URL(config.upstreamUrl),
    verifyUpstreamTLS: config.verifyUpstreamTls,
    certificate,
    authorize: (req) => verifier.verifyRequest(req)
  });

  proxy.on('newTunnel', (session: TunnelSession) => {
    report(args, { ev: 'newTunnel', tunnel: session.toJSON() },
      `[${session.id}] New tunnel from ${session.incoming} to ${session.upstream}`);

    session.on('relayError', (direction: RelayDirection, err: unknown) => {
      debug({ ev: 'relayError', tunnelId: session.id, direction, err: errorMessage(err) },
        `[${session.id} ${direction}] Relay ended with error: ${errorMessage(err)}`);
    });

    session.on('tunnelClosed', () => {
      report(args, { ev: 'tunnelClosed', tunnel: session.toJSON() },
        `[${session.id}] Tunnel closed (in: ${session.bytesIn} bytes, out: ${session.bytesOut} bytes)`);
    });
  });

  proxy.on('authorized', (remote: string, subject?: string) => {
    debug({ ev: 'authorized', remote, subject }, `${remote} authorized as ${subject ?? 'unknown'}`);
  });
  proxy.on('unauthorized', (remote: string, reason?: string) => {
    report(args, { ev: 'unauthorized', remote, reason }, `${remote} rejected: ${reason ?? 'unauthorized'}`);
  });
  proxy.on('tunnelError', (remote: string, err: unknown) => {
    report(args, { ev: 'tunnelError', remote, err: errorMessage(err) }, `${remote} tunnel failed: ${errorMessage(err)}`);
  });
  proxy.on('connectionError', (remote: string, err: Error) => {
    debug({ ev: 'connectionError', remote, err: err.message }, `${remote} connection error: ${err.message}`);
  });
  proxy.on('plainRequest', (remote: string, method?: string, url?: string) => {
    debug({ ev: 'plainRequest', remote, method, url }, `${remote} ${method} ${url} is not an upgrade request`);
  });

  const local = parseListenAddress(config.listen);
  await proxy.listen(local);
  report(args, { ev: 'listening', addr: proxy.address(), upstream: config.upstreamUrl },
    `Listening on ${JSON.stringify(proxy.address())} forwarding upgrades to ${config.upstreamUrl}`);

  const shutdown = () => {
    client.close();
    proxy.close().then(
      () => report(args, { ev: 'closed' }, 'Proxy closed'),
      (err: unknown) => report(args, { ev: 'closeError', err: errorMessage(err) }, `Failed to close proxy: ${errorMessage(err)}`)
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

(async () => {
  const args = parseArgs(process.argv);

  if (args.help || !args.config) {
    printUsage();
    return;
  }

  const config = applyArgs(await loadConfig(args.config), args);
  await run(args, config);
})().catch((err: Error) => process.nextTick(() => { throw err; }));
