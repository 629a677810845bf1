import { promises as fs } from 'fs';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError } from './errors';

const configSchema = z.object({
  discoveryUrl: z.string().url(),
  clientId: z.string().min(1),
  clientSecret: z.string().default(''),
  redirectionUrl: z.string().url(),
  scopes: z.array(z.string()).default([]),
  skipOpenidProviderTlsVerify: z.boolean().default(false),
  discoveryTimeoutMs: z.number().int().positive().default(30000),

  encryptionKey: z.string().min(1),
  cookieName: z.string().min(1).default('proxy-session'),

  tlsCertificate: z.string().optional(),
  tlsPrivateKey: z.string().optional(),

  listen: z.string().default('127.0.0.1:3000'),
  upstreamUrl: z.string().url(),
  verifyUpstreamTls: z.boolean().default(true)
}).refine((cfg) => Boolean(cfg.tlsCertificate) === Boolean(cfg.tlsPrivateKey), {
  message: 'tlsCertificate and tlsPrivateKey must be set together',
  path: ['tlsPrivateKey']
});

export type ProxyConfig = z.infer<typeof configSchema>;

export function parseConfig(raw: unknown): ProxyConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new ConfigError(`invalid configuration: ${issues.join('; ')}`, { cause: result.error });
  }
  return result.data;
}

// Parses the file as JSON for a .json extension and as YAML otherwise.
export function parseConfigText(filename: string, content: string): unknown {
  try {
    return path.extname(filename).toLowerCase() === '.json' ? JSON.parse(content) : parseYaml(content);
  } catch (err) {
    throw new ConfigError(`unable to parse ${filename}: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
  }
}

export async function loadConfig(filename: string): Promise<ProxyConfig> {
  let content: string;
  try {
    content = await fs.readFile(filename, 'utf8');
  } catch (err) {
    throw new ConfigError(`unable to read ${filename}`, { cause: err });
  }
  return parseConfig(parseConfigText(filename, content));
}

export function parseListenAddress(str: string): { host: string; port: number } {
  const idx = str.lastIndexOf(':');
  if (idx === -1) {
    return { host: 'localhost', port: +str };
  }
  return { host: str.slice(0, idx).replace(/^\[(.*)\]$/, '$1') || 'localhost', port: +str.slice(idx + 1) };
}
