import log from 'npmlog';

export type LogLevel = 'silly' | 'verbose' | 'info' | 'http' | 'warn' | 'error';

const KNOWN_LEVELS = ['silly', 'verbose', 'info', 'timing', 'http', 'notice', 'warn', 'error', 'silent'];

export const DEFAULT_LOG_LEVEL = 'info';

/**
 * Maps the `LOG_LEVEL` environment variable onto an npmlog level.
 * Unknown values fall back to `info`.
 */
export const resolveLogLevel = (value: string | undefined): string => {
    const normalized = value?.trim().toLowerCase();

    if (normalized && KNOWN_LEVELS.includes(normalized)) {
        return normalized;
    }

    return DEFAULT_LOG_LEVEL;
};

log.level = resolveLogLevel(process.env.LOG_LEVEL);

export { log };
