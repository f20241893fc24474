/**
 * Engine Debug Manager - structured trace logging
 * Centralizes engine trace logs so a fixture's evaluation can be replayed
 * from the in-memory buffer.
 */

export type LogLevel = 'TRACE' | 'INFO' | 'WARN' | 'ERROR';

export type ConsoleThreshold = LogLevel | 'SILENT';

export interface DebugLog {
    timestamp: string;
    level: LogLevel;
    component: string;
    event: string;
    fixtureId?: string;
    data?: unknown;
}

const LEVEL_RANK: Record<ConsoleThreshold, number> = {
    TRACE: 0,
    INFO: 1,
    WARN: 2,
    ERROR: 3,
    SILENT: 4
};

export class DebugManager {
    private logs: DebugLog[] = [];
    private subscribers: ((log: DebugLog) => void)[] = [];

    constructor(
        private maxLogs = 500,
        private consoleThreshold: ConsoleThreshold = 'WARN'
    ) { }

    setConsoleThreshold(threshold: ConsoleThreshold) {
        this.consoleThreshold = threshold;
    }

    log(level: LogLevel, component: string, event: string, fixtureId?: string, data?: unknown) {
        const log: DebugLog = {
            timestamp: new Date().toISOString(),
            level,
            component,
            event,
            fixtureId,
            data
        };

        this.logs.unshift(log);
        if (this.logs.length > this.maxLogs) {
            this.logs.pop();
        }

        if (LEVEL_RANK[level] >= LEVEL_RANK[this.consoleThreshold]) {
            const line = `[${level}] [${component}] ${event}${fixtureId ? ` (${fixtureId})` : ''}`;
            const sink = level === 'ERROR' ? console.error : level === 'WARN' ? console.warn : console.log;
            if (data === undefined) sink(line);
            else sink(line, data);
        }

        this.subscribers.forEach(sub => sub(log));
    }

    info(component: string, event: string, fixtureId?: string, data?: unknown) {
        this.log('INFO', component, event, fixtureId, data);
    }

    warn(component: string, event: string, fixtureId?: string, data?: unknown) {
        this.log('WARN', component, event, fixtureId, data);
    }

    error(component: string, event: string, fixtureId?: string, data?: unknown) {
        this.log('ERROR', component, event, fixtureId, data);
    }

    trace(component: string, event: string, fixtureId?: string, data?: unknown) {
        this.log('TRACE', component, event, fixtureId, data);
    }

    getLogs() {
        return this.logs;
    }

    getLogsForFixture(fixtureId: string) {
        return this.logs.filter(l => l.fixtureId === fixtureId);
    }

    subscribe(fn: (log: DebugLog) => void) {
        this.subscribers.push(fn);
        return () => {
            this.subscribers = this.subscribers.filter(sub => sub !== fn);
        };
    }

    clear() {
        this.logs = [];
    }
}

export const debugManager = new DebugManager();
