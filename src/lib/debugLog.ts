type LogLevel = 'info' | 'warn' | 'error';

export interface LogEntry {
    timestamp: number;
    message: string;
    level: LogLevel;
}

const PREFIX = '[haul-cycles]';

class DebugLogger {
    private logs: LogEntry[] = [];
    private maxLogs = 500;
    private echo = true;

    log(message: string, level: LogLevel = 'info') {
        const entry = { timestamp: Date.now(), message, level };
        this.logs.unshift(entry);
        if (this.logs.length > this.maxLogs) {
            this.logs.pop();
        }
        if (!this.echo) return;
        if (level === 'error') {
            console.error(`${PREFIX} ${message}`);
        } else if (level === 'warn') {
            console.warn(`${PREFIX} ${message}`);
        } else {
            console.log(`${PREFIX} ${message}`);
        }
    }

    info(message: string) {
        this.log(message, 'info');
    }

    error(message: string) {
        this.log(message, 'error');
    }

    warn(message: string) {
        this.log(message, 'warn');
    }

    /** Keeps recording entries but stops writing them to the console. */
    setEcho(enabled: boolean) {
        this.echo = enabled;
    }

    getLogs() {
        return [...this.logs];
    }

    clear() {
        this.logs = [];
    }
}

export const debugLog = new DebugLogger();
