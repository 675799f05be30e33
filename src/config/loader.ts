import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';
import { ConfigError, errorMessage } from '../errors.js';
import { getPaths } from '../utils/paths.js';
import { HooklineConfigSchema, type HooklineConfig } from './schema.js';

/**
 * Config Loader — reads `config.yaml` from the config directory
 *
 * A missing file means "all defaults". A file that exists but does not
 * parse or validate is an error: silently ignoring it would hide typos in
 * timeouts.
 */
export class ConfigLoader {
    private readonly filePath: string;

    constructor(filePath: string = getPaths().configFile) {
        this.filePath = filePath;
    }

    get path(): string {
        return this.filePath;
    }

    async load(): Promise<HooklineConfig> {
        let content: string;
        try {
            content = await readFile(this.filePath, 'utf-8');
        } catch (err) {
            if (isMissing(err)) return HooklineConfigSchema.parse({});
            throw new ConfigError(`reading ${this.filePath}: ${errorMessage(err)}`, { cause: err });
        }

        let raw: unknown;
        try {
            raw = parseYaml(content);
        } catch (err) {
            throw new ConfigError(`parsing ${this.filePath}: ${errorMessage(err)}`, { cause: err });
        }

        const result = HooklineConfigSchema.safeParse(raw ?? {});
        if (!result.success) {
            const issue = result.error.issues[0];
            const field = issue.path.join('.');
            throw new ConfigError(`${this.filePath}: ${field ? `${field}: ` : ''}${issue.message}`);
        }
        return result.data;
    }
}

function isMissing(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
