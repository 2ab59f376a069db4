export { Server } from './server';
export type { ConnectionClosedData, ConnectionStats, RequestFailedData } from './server';
export { RequestError } from './request_error';
export { ConfigError, createRuntimeConfig, formatSocketAddress, parseSocketAddress } from './config';
export type { RuntimeConfig, RuntimeConfigInput, SocketAddress } from './config';
export { parseProxyRequest, readRequestHead, rewriteRequestLine } from './http_request';
export type { ConnectRequest, HttpRequest, ProxyRequest, ProxyTarget } from './http_request';
export { pump } from './pump';
export type { PumpResult } from './pump';
export { connectSocks5, connectUpstream, negotiateSocks5 } from './socks/socks5_client';
export type { Socks5BoundAddress } from './socks/socks5_client';
export { checkDestination } from './socks/socks5_address';
export type { Socks5Destination } from './socks/socks5_address';
export { Socks5Error } from './socks/socks5_error';
export type { Socks5ErrorCode } from './socks/socks5_error';
