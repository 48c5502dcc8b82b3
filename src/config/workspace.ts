import { mkdirSync, existsSync } from 'fs';
import * as os from 'os';
import * as path from 'path';

const CONFIG_FILE_NAME = 'lodestar.json';

/** Root directory for config, logs, sessions and artifacts. `LODESTAR_HOME` overrides it. */
export function getWorkspaceDir(): string {
    const override = process.env.LODESTAR_HOME;
    if (override && override.trim()) {
        return path.resolve(override.trim());
    }
    return path.join(os.homedir(), '.lodestar');
}

export function getWorkspaceSubdir(name: string): string {
    return path.join(getWorkspaceDir(), name);
}

export function getConfigPath(): string {
    return path.join(getWorkspaceDir(), CONFIG_FILE_NAME);
}

export function getLogsDir(): string {
    return getWorkspaceSubdir('logs');
}

export function getArtifactsDir(): string {
    return getWorkspaceSubdir('artifacts');
}

export function getExportsDir(): string {
    return getWorkspaceSubdir('exports');
}

export function ensureWorkspaceDir(): string {
    const dir = getWorkspaceDir();
    if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
    }
    return dir;
}
