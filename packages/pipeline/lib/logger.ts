/**
 * Structured Logging for the Track Pipeline
 *
 * Provides structured logging with consistent formatting, log levels,
 * and a specialized logger that follows one pipeline run through its stages.
 *
 * Features:
 * - Structured JSON logging outside development
 * - Multiple log levels (debug, info, warn, error)
 * - Context-aware logging with timestamps and component identification
 * - Redaction of connection strings and API keys
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogContext = 'pipeline' | 'discovery' | 'fetch' | 'transcribe' | 'database' | 'system';

/**
 * Base log entry structure for consistent formatting
 */
export interface LogEntry {
    timestamp: string;
    level: LogLevel;
    context: LogContext;
    message: string;
    component?: string;
    run_id?: string;
    track_id?: string;
    duration_ms?: number;
    success?: boolean;
    error?: string;
    metadata?: Record<string, unknown>;
}

/**
 * Configuration for the logging system
 */
export interface LoggerConfig {
    minLevel: LogLevel;
    enableConsoleLogging: boolean;
    enableStructuredLogging: boolean;
    enableTimestamps: boolean;
    enableStackTraces: boolean;
    redactSensitiveData: boolean;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3
};

function isLogLevel(value: string | undefined): value is LogLevel {
    return value !== undefined && value in LOG_LEVEL_PRIORITY;
}

/**
 * Default configuration, read from the environment when a logger is created.
 *
 * In test mode (NODE_ENV === 'test') the level defaults to 'warn' unless LOG_LEVEL is set.
 */
function defaultLoggerConfig(): LoggerConfig {
    const envLevel = process.env.LOG_LEVEL?.toLowerCase();
    const isDevelopment = process.env.NODE_ENV === 'development';
    return {
        minLevel: isLogLevel(envLevel)
            ? envLevel
            : (process.env.NODE_ENV === 'test' ? 'warn' : (isDevelopment ? 'debug' : 'info')),
        enableConsoleLogging: true,
        enableStructuredLogging: !isDevelopment,
        enableTimestamps: true,
        enableStackTraces: isDevelopment,
        redactSensitiveData: !isDevelopment
    };
}

const SENSITIVE_PATTERNS = [
    /api_key/i,
    /apikey/i,
    /password/i,
    /secret/i,
    /token/i,
    /authorization/i,
    /database_url/i,
    /connection_string/i
];

// user:password@ inside a connection string
const URL_CREDENTIALS = /\/\/([^:/@\s]+):([^@\s]+)@/g;

/**
 * Redact sensitive keys and credentials embedded in URLs
 */
export function redactSensitiveData(data: unknown): unknown {
    if (typeof data === 'string') {
        return data.replace(URL_CREDENTIALS, '//$1:[REDACTED]@');
    }
    if (!data || typeof data !== 'object') {
        return data;
    }
    if (Array.isArray(data)) {
        return data.map(redactSensitiveData);
    }

    const redacted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
        redacted[key] = SENSITIVE_PATTERNS.some(pattern => pattern.test(key))
            ? '[REDACTED]'
            : redactSensitiveData(value);
    }
    return redacted;
}

/**
 * Core logger class
 */
export class Logger {
    private config: LoggerConfig;

    constructor(config: Partial<LoggerConfig> = {}) {
        this.config = { ...defaultLoggerConfig(), ...config };
    }

    get stackTracesEnabled(): boolean {
        return this.config.enableStackTraces;
    }

    private shouldLog(level: LogLevel): boolean {
        return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.minLevel];
    }

    private createLogEntry(
        level: LogLevel,
        context: LogContext,
        message: string,
        additional: Partial<LogEntry> = {}
    ): LogEntry {
        const entry: LogEntry = {
            timestamp: new Date().toISOString(),
            level,
            context,
            message,
            ...additional
        };

        if (this.config.redactSensitiveData && entry.metadata) {
            const redacted = redactSensitiveData(entry.metadata);
            entry.metadata = redacted && typeof redacted === 'object' && !Array.isArray(redacted)
                ? { ...redacted }
                : undefined;
        }

        return entry;
    }

    private outputLog(entry: LogEntry): void {
        if (!this.shouldLog(entry.level) || !this.config.enableConsoleLogging) {
            return;
        }

        const logFunction = this.getConsoleFunction(entry.level);

        if (this.config.enableStructuredLogging) {
            logFunction(JSON.stringify(entry));
            return;
        }

        // Human-readable logging for development
        const timestamp = this.config.enableTimestamps ? `[${entry.timestamp}] ` : '';
        const contextPrefix = `[${entry.context.toUpperCase()}]`;
        const componentSuffix = entry.component ? ` (${entry.component})` : '';
        const trackSuffix = entry.track_id ? ` [Track: ${entry.track_id}]` : '';
        const durationSuffix = entry.duration_ms !== undefined ? ` (${entry.duration_ms}ms)` : '';
        const line = `${timestamp}${contextPrefix}${componentSuffix}${trackSuffix} ${entry.message}${durationSuffix}`;

        if (entry.metadata) {
            logFunction(line, entry.metadata);
        } else {
            logFunction(line);
        }
    }

    private getConsoleFunction(level: LogLevel): (...args: unknown[]) => void {
        switch (level) {
            case 'debug':
                return console.debug;
            case 'warn':
                return console.warn;
            case 'error':
                return console.error;
            default:
                return console.log;
        }
    }

    debug(context: LogContext, message: string, additional: Partial<LogEntry> = {}): void {
        this.outputLog(this.createLogEntry('debug', context, message, additional));
    }

    info(context: LogContext, message: string, additional: Partial<LogEntry> = {}): void {
        this.outputLog(this.createLogEntry('info', context, message, additional));
    }

    warn(context: LogContext, message: string, additional: Partial<LogEntry> = {}): void {
        this.outputLog(this.createLogEntry('warn', context, message, additional));
    }

    error(context: LogContext, message: string, additional: Partial<LogEntry> = {}): void {
        this.outputLog(this.createLogEntry('error', context, message, additional));
    }
}

export type TrackStage = 'lookup' | 'fetch' | 'transcribe' | 'persist';

/**
 * Specialized logger that stamps every entry with the run id
 */
export class TrackLogger {
    private logger: Logger;
    private runId: string;

    constructor(runId: string, logger: Logger = new Logger()) {
        this.logger = logger;
        this.runId = runId;
    }

    stageStart(stage: TrackStage, trackId: string, metadata: Record<string, unknown> = {}): void {
        this.logger.debug(stageContext(stage), `Starting ${stage}`, {
            component: `${stage}_stage`,
            run_id: this.runId,
            track_id: trackId,
            metadata
        });
    }

    stageSkipped(stage: TrackStage, trackId: string, reason: string): void {
        this.logger.info(stageContext(stage), `Skipping ${stage}: ${reason}`, {
            component: `${stage}_stage`,
            run_id: this.runId,
            track_id: trackId
        });
    }

    stageComplete(stage: TrackStage, trackId: string, durationMs: number, metadata: Record<string, unknown> = {}): void {
        this.logger.info(stageContext(stage), `Completed ${stage}`, {
            component: `${stage}_stage`,
            run_id: this.runId,
            track_id: trackId,
            duration_ms: durationMs,
            success: true,
            metadata
        });
    }

    stageFailed(stage: TrackStage, trackId: string, error: Error): void {
        const entry: Partial<LogEntry> = {
            component: `${stage}_stage`,
            run_id: this.runId,
            track_id: trackId,
            success: false,
            error: error.message,
            metadata: {
                error_name: error.name,
                stack_trace: this.logger.stackTracesEnabled ? error.stack : undefined
            }
        };
        this.logger.error(stageContext(stage), `Failed ${stage}`, entry);
    }

    entrySkipped(index: number, reason: string): void {
        this.logger.warn('discovery', `Skipping entry ${index + 1}: ${reason}`, {
            component: 'orchestrator',
            run_id: this.runId
        });
    }
}

function stageContext(stage: TrackStage): LogContext {
    return stage === 'persist' || stage === 'lookup' ? 'database' : stage;
}

/**
 * Create a new generic logger instance
 */
export function createLogger(config: Partial<LoggerConfig> = {}): Logger {
    return new Logger(config);
}

export function createTrackLogger(runId: string, logger?: Logger): TrackLogger {
    return new TrackLogger(runId, logger);
}
