import * as fs from 'fs';
import * as path from 'path';
import { LanguageHint } from './dialogue/dialogue_types';
import { normalizeLanguageHint } from './dialogue/languageDetector';

// Default paths and constants
export const VERSION = '1.0.0';
export const PROJECT_ROOT = findProjectRoot(__dirname);
export const DEFAULT_TEMPLATES_DIR = path.join(PROJECT_ROOT, 'templates');
export const TEMPLATE_FILE_EXTENSION = '.txt';

// Environment variables read by loadConfig
export const LANGUAGE_ENV_VAR = 'ENTITY_LANGUAGE';
export const DEBUG_ENV_VAR = 'ENTITY_DEBUG';
export const GRAPH_FILE_ENV_VAR = 'ENTITY_GRAPH_FILE';
export const TEMPLATES_CONFIG_ENV_VAR = 'ENTITY_TEMPLATES_CONFIG';

export interface AppConfig {
    defaultLanguage: LanguageHint;
    debug: boolean;
    graphFilePath?: string;
    templatesConfigPath?: string;
}

/**
 * Builds the runtime configuration from environment variables (after dotenv has
 * populated them). Empty values count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const debugValue = (env[DEBUG_ENV_VAR] ?? '').trim().toLowerCase();
    return {
        defaultLanguage: normalizeLanguageHint(env[LANGUAGE_ENV_VAR]),
        debug: debugValue === '1' || debugValue === 'true',
        graphFilePath: env[GRAPH_FILE_ENV_VAR] || undefined,
        templatesConfigPath: env[TEMPLATES_CONFIG_ENV_VAR] || undefined,
    };
}

// Sources run from src/, the build from dist/src/; both sit below the package root.
function findProjectRoot(startDir: string): string {
    let dir = startDir;
    while (!fs.existsSync(path.join(dir, 'package.json'))) {
        const parent = path.dirname(dir);
        if (parent === dir) {
            return path.resolve(startDir, '..');
        }
        dir = parent;
    }
    return dir;
}
