export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogMetadata = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export const isLogLevel = (value: string): value is LogLevel => value in LEVEL_ORDER;

const levelFromEnv = (): LogLevel => {
    const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
    if (raw && isLogLevel(raw)) return raw;
    return process.env.NODE_ENV === 'test' ? 'warn' : 'info';
};

let threshold: LogLevel = levelFromEnv();

export const setLogLevel = (level: LogLevel): void => {
    threshold = level;
};

export const getLogLevel = (): LogLevel => threshold;

// Free clinical text never reaches the logs
const REDACT_KEYS = [/history/i, /report/i, /text$/i, /description/i, /explanation/i, /prompt/i, /^patient_?id$/i];

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

const redactValue = (value: unknown): unknown => {
    if (typeof value === 'string') {
        if (value.length > 120 || value.includes('\n')) {
            return '[REDACTED]';
        }
        return value;
    }

    if (Array.isArray(value)) {
        return value.map((v) => redactValue(v));
    }

    if (isRecord(value)) {
        const out: Record<string, unknown> = {};
        for (const [k, v] of Object.entries(value)) {
            out[k] = REDACT_KEYS.some((re) => re.test(k)) ? '[REDACTED]' : redactValue(v);
        }
        return out;
    }

    return value;
};

const emit = (level: LogLevel, message: string, metadata?: LogMetadata): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;

    const redacted = metadata ? redactValue(metadata) : undefined;
    const entry = {
        timestamp: new Date().toISOString(),
        level,
        message: redactValue(message),
        ...(isRecord(redacted) ? redacted : {}),
    };

    // stdout belongs to CLI output
    if (level === 'error') {
        console.error(JSON.stringify(entry));
    } else {
        console.warn(JSON.stringify(entry));
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
