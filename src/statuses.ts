import { STATUS_CODES } from 'node:http';

export const CONNECTION_ESTABLISHED_RESPONSE = 'HTTP/1.1 200 Connection Established\r\n\r\n';

export const requestErrorStatusCodes = {
    /**
     * Request line or Host header could not be parsed.
     */
    BAD_REQUEST: 400,
    /**
     * Request head did not end within the size cap.
     */
    HEAD_TOO_LARGE: 431,
} as const;

/**
 * Responses originated by the adapter carry no headers and no body.
 */
export const createStatusLineResponse = (statusCode: number): string => {
    return `HTTP/1.1 ${statusCode} ${STATUS_CODES[statusCode] || 'Unknown Status Code'}\r\n\r\n`;
};
