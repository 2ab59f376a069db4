import type { HandlerOpts, HandlerServer } from './chain_socks';
import { chainSocks } from './chain_socks';
import type { HttpRequest } from './http_request';
import type { PumpResult } from './pump';
import { pump } from './pump';
import type { Socket } from './socket';

interface ForwardSocksOpts {
    request: HttpRequest;
    sourceSocket: Socket;
    server: HandlerServer;
    handlerOpts: HandlerOpts;
}

/**
 * The request head goes upstream with only its request line rewritten,
 * then the rest of the exchange is relayed untouched.
 * ```
 * Client -> Adapter (HTTP) -> Upstream (SOCKS5) -> Web
 * Client <- Adapter (HTTP) <- Upstream (SOCKS5) <- Web
 * ```
 */
export const forwardSocks = async ({
    request,
    sourceSocket,
    server,
    handlerOpts,
}: ForwardSocksOpts): Promise<PumpResult> => {
    const targetSocket = await chainSocks({ sourceSocket, target: request.target, server, handlerOpts });

    targetSocket.write(request.rewritten);

    const result = await pump(sourceSocket, targetSocket);

    return { ...result, aToB: result.aToB + request.rewritten.length };
};
