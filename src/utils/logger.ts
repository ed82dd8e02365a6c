import process from 'node:process';

/**
 * Leveled logger. Everything goes to stderr: stdout carries the MCP
 * JSON-RPC stream and must never see a stray line.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LOG_PREFIX = '[docx-text-tools]';

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
    threshold = level;
}

function isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

export function logToStderr(level: LogLevel, message: string): void {
    if (!isEnabled(level)) return;
    process.stderr.write(`${LOG_PREFIX} ${level.toUpperCase()} ${message}\n`);
}

export const logger = {
    debug: (message: string) => logToStderr('debug', message),
    info: (message: string) => logToStderr('info', message),
    warn: (message: string) => logToStderr('warn', message),
    error: (message: string) => logToStderr('error', message),
};
