import type { Buffer } from 'node:buffer';
import type net from 'node:net';

export type PumpResult = {
    /** Bytes copied from the first socket to the second. */
    aToB: number;
    /** Bytes copied from the second socket to the first. */
    bToA: number;
};

/**
 * Copies bytes both ways between two sockets until both have closed.
 *
 * End of stream on one side half-closes the other side's write half, and the opposite direction
 * keeps flowing until it ends too. An error on either socket destroys both, and the returned
 * promise rejects with that error once both sockets are closed.
 */
export const pump = async (a: net.Socket, b: net.Socket): Promise<PumpResult> => new Promise((resolve, reject) => {
    const result: PumpResult = { aToB: 0, bToA: 0 };

    let firstError: Error | null = null;
    let open = 2;

    const settle = () => {
        open--;
        if (open > 0) return;

        if (firstError) {
            reject(firstError);
        } else {
            resolve(result);
        }
    };

    const attach = (source: net.Socket, target: net.Socket, count: (length: number) => void) => {
        source.on('data', (chunk: Buffer) => count(chunk.length));

        source.on('error', (error) => {
            firstError ??= error;
            target.destroy();
        });

        const onClose = () => {
            if (source.errored || !source.readableEnded) {
                // Closed abruptly, the other side has nothing left to talk to.
                target.destroy();
            } else if (target.writable) {
                // The target may still be paused by backpressure from the closed source.
                // It has to flow again, otherwise it would never see its own end and close.
                target.resume();
                target.end();
            }

            settle();
        };

        if (source.closed) {
            firstError ??= source.errored;
            process.nextTick(onClose);
        } else {
            source.once('close', onClose);
        }

        // `end: true` forwards the FIN, which is exactly a half-close on the target.
        source.pipe(target);
    };

    attach(a, b, (length) => { result.aToB += length; });
    attach(b, a, (length) => { result.bToA += length; });
});
