/**
 * Structured logging for catalog operations
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
    timestamp: string;
    level: LogLevel;
    event: string;
    table?: string;
    entryId?: string;
    message?: string;
    details?: Record<string, unknown>;
}

export interface CatalogLoggerOptions {
    enabled?: boolean;
    //debug events are only written when this is set, defaults to CATALOG_DEBUG
    debug?: boolean;
}

export class CatalogLogger
{
    #enabled: boolean;
    #debug: boolean;

    constructor(options: CatalogLoggerOptions = {})
    {
        this.#enabled = options.enabled ?? true;
        this.#debug = options.debug ?? Boolean(process.env.CATALOG_DEBUG);
    }

    log(level: LogLevel, event: string, data?: Partial<LogEntry>): void
    {
        if (!this.#enabled) return;
        if (level === "debug" && !this.#debug) return;

        const entry: LogEntry = {
            timestamp: new Date().toISOString(),
            level,
            event,
            ...data,
        };

        const parts = [`[${entry.timestamp}] [${level.toUpperCase()}] [${event}]`];
        if (entry.table) parts.push(entry.table);
        if (entry.entryId) parts.push(entry.entryId);
        if (entry.message) parts.push(entry.message);
        if (entry.details) parts.push(JSON.stringify(entry.details));

        const line = parts.join(" ");
        switch (level) {
            case "debug":
                console.debug(line);
                break;
            case "info":
                console.log(line);
                break;
            case "warn":
                console.warn(line);
                break;
            case "error":
                console.error(line);
                break;
        }
    }

    debug(event: string, data?: Partial<LogEntry>): void { this.log("debug", event, data); }
    info(event: string, data?: Partial<LogEntry>): void { this.log("info", event, data); }
    warn(event: string, data?: Partial<LogEntry>): void { this.log("warn", event, data); }
    error(event: string, data?: Partial<LogEntry>): void { this.log("error", event, data); }

    setEnabled(enabled: boolean): void
    {
        this.#enabled = enabled;
    }
}

/**
 * Shared logger, used when a catalog is not handed its own
 */
export const logger = new CatalogLogger();
