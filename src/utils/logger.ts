export type LogLevel = 'debug' | 'info' | 'warn' | 'error';


const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export type LogSink = (level: LogLevel, line: string) => void;

type LogEntry = {
    ts: string;
    level: LogLevel;
    name: string;
    msg: string;
    meta?: unknown;
};


export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === 'string' && value in LEVEL_ORDER;
}


function levelFromEnv(): LogLevel {
    const raw = process.env.LOG_LEVEL;
    return isLogLevel(raw) ? raw : 'info';
}


function safeSerialize(meta: unknown): unknown {
    try {
        if (meta instanceof Error) {
            return { name: meta.name, message: meta.message, stack: meta.stack };
        }
        return JSON.parse(
            JSON.stringify(meta, (_k, v: unknown) => {
                if (v instanceof Set) return Array.from(v);
                if (v instanceof Map) return Object.fromEntries(v);
                if (typeof v === 'bigint') return v.toString();
                if (v instanceof Error) return { name: v.name, message: v.message, stack: v.stack };
                return v;
            })
        );
    } catch {
        return { value: String(meta) };
    }
}


const consoleSink: LogSink = (level, line) => {
    switch (level) {
        case 'debug': console.debug(line); break;
        case 'info': console.log(line); break;
        case 'warn': console.warn(line); break;
        case 'error': console.error(line); break;
    }
};


export class Logger {
    constructor(
        private level: LogLevel = levelFromEnv(),
        private name = 'extractor',
        private sink: LogSink = consoleSink,
    ) { }


    private should(level: LogLevel) {
        return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
    }


    private line(level: LogLevel, msg: string, meta?: unknown) {
        const payload: LogEntry = {
            ts: new Date().toISOString(),
            level,
            name: this.name,
            msg,
        };
        if (meta !== undefined) payload.meta = safeSerialize(meta);
        return JSON.stringify(payload);
    }

    private emit(level: LogLevel, msg: string, meta?: unknown) {
        if (this.should(level)) this.sink(level, this.line(level, msg, meta));
    }


    debug(msg: string, meta?: unknown) {
        this.emit('debug', msg, meta);
    }
    info(msg: string, meta?: unknown) {
        this.emit('info', msg, meta);
    }
    warn(msg: string, meta?: unknown) {
        this.emit('warn', msg, meta);
    }
    error(msg: string, meta?: unknown) {
        this.emit('error', msg, meta);
    }


    child(bindings: Partial<{ name: string; level: LogLevel }>) {
        return new Logger(bindings.level ?? this.level, bindings.name ?? this.name, this.sink);
    }
}


const logger = new Logger();

export default logger;
