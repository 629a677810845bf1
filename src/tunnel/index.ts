export { tunnel, TunnelSession } from './tunnel';
export type { TunnelOptions, RelayDirection } from './tunnel';
export { dialTarget, dialAddress, dialUpstream } from './dial';
export type { DialTarget, DialOptions } from './dial';
export { UpgradeTransport, ResponseTransport, serializeRequestHead } from './transport';
export type { ClientTransport, HijackedConnection } from './transport';
