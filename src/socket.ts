import type net from 'node:net';

type AdditionalProps = {
    connectionId?: number;
    /**
     * Connection to the SOCKS5 endpoint opened for this client, if any.
     * Kept for connection stats and teardown.
     */
    upstream?: net.Socket;
};

export type Socket = net.Socket & AdditionalProps;
