/**
 * Represents a client request the adapter refuses to relay.
 * The status code is sent back to the client as a bare status line,
 * then the connection is closed.
 */
export class RequestError extends Error {
    constructor(
        message: string,
        public statusCode: number,
    ) {
        super(message);
        this.name = RequestError.name;

        Error.captureStackTrace(this, RequestError);
    }
}
