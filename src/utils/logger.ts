import * as fs from 'fs/promises';
import * as path from 'path';
import { getLogsDir } from '../config/workspace.js';

const SENSITIVE_ENV_NAMES = ['ANTHROPIC_API_KEY', 'OPENAI_API_KEY', 'OPENROUTER_API_KEY'] as const;

const SECRET_PATTERNS: readonly RegExp[] = [
    /\bsk-ant-[A-Za-z0-9_-]{16,}\b/g,
    /\bsk-or-v1-[A-Za-z0-9]{16,}\b/g,
    /\bsk-[A-Za-z0-9_-]{16,}\b/g,
    /\bBearer\s+[A-Za-z0-9._~+/=-]{8,}/gi,
];

const KEY_ASSIGNMENT = /\b(api[_-]?key|token|secret|password)\b(\s*[:=]\s*)("?)([^\s"',;]{4,})\3/gi;

/**
 * Redacts credential values before text reaches a log file or the terminal.
 * Configured key values are replaced first, then anything shaped like a key.
 */
export function scrubSensitiveText(text: string): string {
    let scrubbed = text;

    for (const name of SENSITIVE_ENV_NAMES) {
        const value = process.env[name];
        if (value && value.length >= 8) {
            scrubbed = scrubbed.split(value).join(`[REDACTED:${name}]`);
        }
    }

    for (const pattern of SECRET_PATTERNS) {
        scrubbed = scrubbed.replace(pattern, '[REDACTED]');
    }

    return scrubbed.replace(KEY_ASSIGNMENT, (_match, key: string, sep: string, quote: string) => `${key}${sep}${quote}[REDACTED]${quote}`);
}

function dailyLogPath(now: Date): string {
    const day = now.toISOString().slice(0, 10);
    return path.join(getLogsDir(), `${day}.log`);
}

/**
 * Appends a timestamped line to today's log. Logging must never break a turn,
 * so write failures are reported to stderr and the promise still resolves.
 */
export async function logThought(text: string): Promise<void> {
    const now = new Date();
    const line = `[${now.toISOString()}] ${scrubSensitiveText(text)}\n`;
    const target = dailyLogPath(now);
    try {
        await fs.mkdir(path.dirname(target), { recursive: true });
        await fs.appendFile(target, line, 'utf-8');
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[Logger] Failed to write ${target}: ${message}`);
    }
}
