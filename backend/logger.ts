import path from 'node:path';
import fs from 'node:fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };
const MAX_SIZE = 5 * 1024 * 1024; // 5MB

let minLevel: LogLevel = 'info';
let logFile: string | null = null;
let logStream: fs.WriteStream | null = null;

export function isLogLevel(value: unknown): value is LogLevel {
    return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

/**
 * Sets the minimum level and, when `dir` is given, opens `<dir>/photo-store.log`
 * as an additional sink. Passing `dir: null` detaches the file sink.
 */
export function configureLogger(options: { level?: LogLevel; dir?: string | null }) {
    if (options.level) minLevel = options.level;
    if (options.dir === undefined) return;

    logStream?.end();
    logStream = null;
    logFile = null;

    if (options.dir) {
        fs.mkdirSync(options.dir, { recursive: true });
        logFile = path.join(options.dir, 'photo-store.log');
        logStream = openStream(logFile);
    }
}

function openStream(file: string): fs.WriteStream {
    const stream = fs.createWriteStream(file, { flags: 'a' });
    stream.on('error', err => console.error('Log file unavailable:', err));
    return stream;
}

function rotateLogIfNeeded() {
    if (!logFile || !logStream) return;
    try {
        if (fs.existsSync(logFile)) {
            const stats = fs.statSync(logFile);
            if (stats.size > MAX_SIZE) {
                logStream.end();
                const oldLog = logFile + '.old';
                if (fs.existsSync(oldLog)) fs.unlinkSync(oldLog);
                fs.renameSync(logFile, oldLog);
                logStream = openStream(logFile);
            }
        }
    } catch (err) {
        console.error('Failed to rotate logs:', err);
    }
}

function stringify(arg: unknown): string {
    if (arg instanceof Error) return arg.stack ?? `${arg.name}: ${arg.message}`;
    if (typeof arg === 'object' && arg !== null) return JSON.stringify(arg);
    return String(arg);
}

export function formatMsg(level: string, ...args: unknown[]) {
    const msg = args.map(stringify).join(' ');
    return `[${new Date().toISOString()}] [${level}] ${msg}\n`;
}

function write(level: LogLevel, sink: (...args: unknown[]) => void, args: unknown[]) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
    sink(...args);
    if (logStream) {
        rotateLogIfNeeded();
        logStream.write(formatMsg(level.toUpperCase(), ...args));
    }
}

// Console output goes to stderr; stdout carries command output only
const logger = {
    debug: (...args: unknown[]) => write('debug', console.error, args),
    info: (...args: unknown[]) => write('info', console.error, args),
    warn: (...args: unknown[]) => write('warn', console.warn, args),
    error: (...args: unknown[]) => write('error', console.error, args),
    getLogPath: () => logFile,
    getLevel: () => minLevel
};

export default logger;
