export const DEFAULT_LISTEN_ADDRESS = '127.0.0.1:8080';
export const DEFAULT_SOCKS_ADDRESS = '127.0.0.1:1080';

export type SocketAddress = {
    host: string;
    port: number;
};

/**
 * Settings shared by every connection handler. Built once and frozen.
 */
export type RuntimeConfig = {
    readonly listen: Readonly<SocketAddress>;
    readonly socks: Readonly<SocketAddress>;
    /** Relay raw TCP to the SOCKS5 server instead of speaking HTTP to the client. */
    readonly forward: boolean;
};

export type RuntimeConfigInput = {
    listen?: string | SocketAddress;
    socks?: string | SocketAddress;
    forward?: boolean;
};

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = ConfigError.name;

        Error.captureStackTrace(this, ConfigError);
    }
}

const isValidPort = (port: number, allowZeroPort: boolean): boolean => {
    return Number.isInteger(port) && port <= 65535 && (port > 0 || (allowZeroPort && port === 0));
};

/**
 * Parses `host:port`, or `[v6]:port` for IPv6 hosts. The brackets are not part of the returned host.
 */
export const parseSocketAddress = (text: string, { allowZeroPort = false } = {}): SocketAddress => {
    const value = text.trim();

    let host: string;
    let portText: string;

    if (value.startsWith('[')) {
        const closing = value.indexOf(']');
        if (closing === -1 || value[closing + 1] !== ':') {
            throw new ConfigError(`Address "${text}" must have the form [host]:port`);
        }

        host = value.slice(1, closing);
        portText = value.slice(closing + 2);
    } else {
        const separator = value.lastIndexOf(':');
        if (separator === -1) {
            throw new ConfigError(`Address "${text}" is missing a port`);
        }

        host = value.slice(0, separator);
        portText = value.slice(separator + 1);

        if (host.includes(':')) {
            throw new ConfigError(`IPv6 address "${text}" must be written as [host]:port`);
        }
    }

    if (!host) {
        throw new ConfigError(`Address "${text}" is missing a host`);
    }

    const port = /^\d+$/.test(portText) ? Number(portText) : NaN;
    if (!isValidPort(port, allowZeroPort)) {
        throw new ConfigError(`Address "${text}" has an invalid port "${portText}"`);
    }

    return { host, port };
};

export const formatSocketAddress = ({ host, port }: SocketAddress): string => {
    return host.includes(':') ? `[${host}]:${port}` : `${host}:${port}`;
};

const resolveAddress = (input: string | SocketAddress, allowZeroPort: boolean): SocketAddress => {
    if (typeof input === 'string') {
        return parseSocketAddress(input, { allowZeroPort });
    }

    if (!input.host || !isValidPort(input.port, allowZeroPort)) {
        throw new ConfigError(`Address "${formatSocketAddress(input)}" is not valid`);
    }

    return { host: input.host, port: input.port };
};

export const createRuntimeConfig = (input: RuntimeConfigInput = {}): RuntimeConfig => {
    return Object.freeze({
        // Port 0 lets the operating system pick a free port.
        listen: Object.freeze(resolveAddress(input.listen ?? DEFAULT_LISTEN_ADDRESS, true)),
        socks: Object.freeze(resolveAddress(input.socks ?? DEFAULT_SOCKS_ADDRESS, false)),
        forward: input.forward ?? false,
    });
};
