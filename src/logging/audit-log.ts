import { appendFile, mkdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { AuditError, errorMessage } from '../errors.js';

export interface AuditEntry {
    timestamp: string;
    plugin: string;
    action: string;
    detail: string;
}

const LINE = /^(\S+) plugin=(\S*) action=(\S*) ?(.*)$/;

/**
 * Audit Logger — append-only record of plugin installs, removals and hook
 * failures.
 *
 * One line per event:
 *   2026-01-15T10:30:00Z plugin=tag-enforcer action=install version=1.0.0
 *
 * This is a security record: a failed write throws AuditError instead of
 * being dropped.
 */
export class AuditLogger {
    constructor(private readonly logPath: string) { }

    get path(): string {
        return this.logPath;
    }

    async record(plugin: string, action: string, detail = '', now: Date = new Date()): Promise<AuditEntry> {
        const entry: AuditEntry = {
            timestamp: now.toISOString().replace(/\.\d{3}Z$/, 'Z'),
            plugin: oneToken(plugin),
            action: oneToken(action),
            detail: detail.replace(/[\r\n]+/g, ' ').trim(),
        };

        try {
            await mkdir(path.dirname(this.logPath), { recursive: true });
            await appendFile(this.logPath, formatEntry(entry) + '\n', { encoding: 'utf-8', mode: 0o644 });
        } catch (err) {
            throw new AuditError(`writing audit log ${this.logPath}: ${errorMessage(err)}`, { cause: err });
        }

        return entry;
    }

    /**
     * Most recent entries, oldest first
     */
    async tail(lines = 30): Promise<AuditEntry[]> {
        let content: string;
        try {
            content = await readFile(this.logPath, 'utf-8');
        } catch (err) {
            if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
            throw new AuditError(`reading audit log ${this.logPath}: ${errorMessage(err)}`, { cause: err });
        }

        return content
            .split('\n')
            .filter(l => l.trim())
            .slice(-lines)
            .map(parseEntry)
            .filter((e): e is AuditEntry => e !== null);
    }
}

export function formatEntry(entry: AuditEntry): string {
    const head = `${entry.timestamp} plugin=${entry.plugin} action=${entry.action}`;
    return entry.detail ? `${head} ${entry.detail}` : head;
}

export function parseEntry(line: string): AuditEntry | null {
    const match = LINE.exec(line);
    if (!match) return null;
    return { timestamp: match[1], plugin: match[2], action: match[3], detail: match[4] };
}

// key=value parsing depends on these having no whitespace
function oneToken(value: string): string {
    return value.trim().replace(/\s+/g, '_') || '-';
}
