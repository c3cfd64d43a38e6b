type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'none';

type LogMetadata = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    none: 4,
};

const getMode = (): 'production' | 'development' => {
    if (typeof process !== 'undefined' && process.env && process.env.NODE_ENV === 'production') {
        return 'production';
    }
    return 'development';
};

const isProduction = (): boolean => getMode() === 'production';

const isLogLevel = (value: string): value is LogLevel => value in LEVEL_ORDER;

/**
 * ANONYMIZER_LOG_LEVEL wins; otherwise warn+ in production, debug+ in development.
 */
const minimumLevel = (): LogLevel => {
    const configured = typeof process !== 'undefined' ? process.env.ANONYMIZER_LOG_LEVEL?.toLowerCase() : undefined;
    if (configured === 'warning') return 'warn';
    if (configured && isLogLevel(configured)) return configured;
    return isProduction() ? 'warn' : 'debug';
};

// Keys whose values can carry entity or source text.
const REDACT_KEYS = [/^text$/i, /text$/i, /original/i, /replacement$/i, /content/i, /value$/i, /entity$/i];

const redactValue = (value: unknown): unknown => {
    if (typeof value === 'string') {
        // Keep small strings (labels, ids) but redact longer payloads.
        if (value.length > 120 || value.includes('\n')) {
            return '[REDACTED]';
        }
        return value;
    }

    if (Array.isArray(value)) {
        return value.map((v) => redactValue(v));
    }

    if (value && typeof value === 'object') {
        const out: Record<string, unknown> = {};
        for (const [k, v] of Object.entries(value)) {
            if (REDACT_KEYS.some((re) => re.test(k))) {
                out[k] = '[REDACTED]';
            } else {
                out[k] = redactValue(v);
            }
        }
        return out;
    }

    return value;
};

const shouldLog = (level: LogLevel): boolean => LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel()];

const emit = (level: Exclude<LogLevel, 'none'>, message: string, metadata?: LogMetadata): void => {
    if (!shouldLog(level)) return;

    const entry = {
        timestamp: new Date().toISOString(),
        level,
        message: redactValue(message),
        ...(metadata ? { metadata: redactValue(metadata) } : {}),
    };

    if (level === 'error') {
        console.error(JSON.stringify(entry));
    } else if (level === 'warn') {
        console.warn(JSON.stringify(entry));
    } else if (level === 'info') {
        console.info(JSON.stringify(entry));
    } else {
        console.log(JSON.stringify(entry));
    }
};

export const appLogger = {
    debug(message: string, metadata?: LogMetadata) {
        emit('debug', message, metadata);
    },
    info(message: string, metadata?: LogMetadata) {
        emit('info', message, metadata);
    },
    warn(message: string, metadata?: LogMetadata) {
        emit('warn', message, metadata);
    },
    error(message: string, metadata?: LogMetadata) {
        emit('error', message, metadata);
    },
};

export { redactValue as redactLogValue };
