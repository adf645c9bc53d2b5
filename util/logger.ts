export enum LogLevel {
    Silent,
    Error,
    Warn,
    Info,
    Debug,
}

export interface LogSink {
    error(message: string): void;
    warn(message: string): void;
    info(message: string): void;
    debug(message: string): void;
}

export interface Logger {
    readonly level: LogLevel;
    error(message: string, payload?: unknown): void;
    warn(message: string, payload?: unknown): void;
    info(message: string, payload?: unknown): void;
    debug(message: string, payload?: unknown): void;
}

export interface LoggerOptions {
    /** Prefix of every line. */
    name?: string;
    level?: LogLevel;
    /** Defaults to the console. */
    sink?: LogSink;
}

class SinkLogger implements Logger {
    public readonly level: LogLevel;
    private readonly _name: string;
    private readonly _sink: LogSink;

    constructor(options: LoggerOptions) {
        this.level = options.level ?? LogLevel.Info;
        this._name = options.name ?? 'pyscope';
        this._sink = options.sink ?? console;
    }

    public error(message: string, payload?: unknown) {
        if (this.level >= LogLevel.Error)
            this._sink.error(this._format('error', message, payload));
    }

    public warn(message: string, payload?: unknown) {
        if (this.level >= LogLevel.Warn)
            this._sink.warn(this._format('warn', message, payload));
    }

    public info(message: string, payload?: unknown) {
        if (this.level >= LogLevel.Info)
            this._sink.info(this._format('info', message, payload));
    }

    public debug(message: string, payload?: unknown) {
        if (this.level >= LogLevel.Debug)
            this._sink.debug(this._format('debug', message, payload));
    }

    private _format(level: string, message: string, payload: unknown) {
        const line = `[${this._name}] ${level}: ${message}`;
        return payload === undefined ? line : `${line} ${JSON.stringify(payload)}`;
    }
}

export function createLogger(options: LoggerOptions = {}): Logger {
    return new SinkLogger(options);
}

export const silentLogger: Logger = createLogger({level: LogLevel.Silent});
