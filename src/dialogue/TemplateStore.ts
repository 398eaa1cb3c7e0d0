import * as fs from 'fs';
import * as path from 'path';
import { DEFAULT_TEMPLATES_DIR, TEMPLATE_FILE_EXTENSION } from '../config';
import { ConfigurationError, dbg } from '../utils';
import { Language, LANGUAGES, RenderContext, RESPONSE_TYPES, ResponseType } from './dialogue_types';
import { FALLBACK_SLOTS, FullTemplatesConfig, TemplatesConfigSchema } from './templateTypes';

export interface TemplateStoreDependencies {
    readFileFn?: (path: string, encoding: BufferEncoding) => string;
    resolvePathFn?: (...paths: string[]) => string;
    dirnameFn?: (p: string) => string;
    isAbsoluteFn?: (p: string) => boolean;
}

type TemplateKey = `${ResponseType}:${Language}`;

const SLOT_PATTERN = /\{\{(\w+)\}\}/g;

function templateKey(type: ResponseType, language: Language): TemplateKey {
    return `${type}:${language}`;
}

/**
 * Short human-readable summary of the graph counters, used by the fallback reply.
 */
export function describeGraphStatus(language: Language, graphNodes: number, graphEdges: number): string {
    if (graphNodes === 0 && graphEdges === 0) {
        return language === 'ru' ? 'графового состояния пока нет' : 'no graph state yet';
    }
    return language === 'ru'
        ? `отслеживается узлов: ${graphNodes}, рёбер: ${graphEdges}`
        : `${graphNodes} nodes, ${graphEdges} edges tracked`;
}

/**
 * Replaces every `{{name}}` slot in one pass. Values are inserted literally, so
 * slot markers or `$` sequences inside a value are never expanded.
 */
export function fillSlots(template: string, values: Record<string, string>): string {
    return template.replace(SLOT_PATTERN, (slot: string, name: string) =>
        Object.prototype.hasOwnProperty.call(values, name) ? values[name] : slot
    );
}

export function listSlots(template: string): string[] {
    return Array.from(template.matchAll(SLOT_PATTERN), match => match[1]);
}

// --- TemplateStore Class ---
export class TemplateStore {
    private templates?: Map<TemplateKey, string>;
    private loadDefects: string[] = [];
    private readonly configFilePath?: string;
    private readonly configDir?: string;
    private readonly templatesDir: string;

    // Store injected dependencies or defaults
    private readonly readFileFn: (path: string, encoding: BufferEncoding) => string;
    private readonly resolvePathFn: (...paths: string[]) => string;
    private readonly dirnameFn: (p: string) => string;
    private readonly isAbsoluteFn: (p: string) => boolean;

    constructor(configFilePath?: string, deps?: TemplateStoreDependencies, templatesDir: string = DEFAULT_TEMPLATES_DIR) {
        this.readFileFn = deps?.readFileFn || ((p, encoding) => fs.readFileSync(p, encoding));
        this.resolvePathFn = deps?.resolvePathFn || path.resolve;
        this.dirnameFn = deps?.dirnameFn || path.dirname;
        this.isAbsoluteFn = deps?.isAbsoluteFn || path.isAbsolute;
        this.templatesDir = templatesDir;

        if (configFilePath) {
            this.configFilePath = this.resolvePathFn(configFilePath);
            this.configDir = this.dirnameFn(this.configFilePath);
        }
    }

    /**
     * Lists every configuration defect: templates that could not be read, fixed
     * templates carrying slots, and fallback templates missing a required slot.
     * An empty list means every response type renders in every language.
     */
    verify(): string[] {
        const templates = this._ensureLoaded();
        const defects = [...this.loadDefects];

        for (const [key, text] of templates) {
            const slots = listSlots(text);
            if (key.startsWith('fallback:')) {
                const missing = FALLBACK_SLOTS.filter(slot => !slots.includes(slot));
                if (missing.length > 0) {
                    defects.push(`Template ${key} is missing slot(s): ${missing.join(', ')}`);
                }
            } else if (slots.length > 0) {
                defects.push(`Template ${key} is fixed but contains slot(s): ${slots.join(', ')}`);
            }
        }
        return defects;
    }

    /**
     * Renders the reply for a response type. A type without a template in the
     * requested language is answered with that language's fallback template.
     * @throws ConfigurationError when even the fallback template is unavailable.
     */
    render(type: ResponseType, language: Language, context: RenderContext): string {
        const templates = this._ensureLoaded();
        let template = templates.get(templateKey(type, language));
        if (template === undefined) {
            console.warn(`TemplateStore: no ${language} template for "${type}", using fallback.`);
            template = templates.get(templateKey('fallback', language));
        }
        if (template === undefined) {
            throw new ConfigurationError([`No fallback template available for language "${language}"`]);
        }

        return fillSlots(template, {
            original: context.original,
            graphStatus: describeGraphStatus(language, context.graphNodes, context.graphEdges),
        });
    }

    getTemplate(type: ResponseType, language: Language): string | undefined {
        return this._ensureLoaded().get(templateKey(type, language));
    }

    private _ensureLoaded(): Map<TemplateKey, string> {
        if (this.templates) {
            return this.templates;
        }
        const config = this._loadConfig();
        const templates = new Map<TemplateKey, string>();

        for (const type of RESPONSE_TYPES) {
            for (const language of LANGUAGES) {
                const custom = config?.templates[type]?.[language];
                const templatePath = custom
                    ? this._resolvePath(custom.path)
                    : this.resolvePathFn(this.templatesDir, language, `${type}${TEMPLATE_FILE_EXTENSION}`);
                try {
                    const text = this.readFileFn(templatePath, 'utf-8').trimEnd();
                    if (!text) {
                        this.loadDefects.push(`Template ${templateKey(type, language)} at ${templatePath} is empty`);
                        continue;
                    }
                    templates.set(templateKey(type, language), text);
                } catch (error: unknown) {
                    this.loadDefects.push(`Template ${templateKey(type, language)} could not be read from ${templatePath}: ${errorMessage(error)}`);
                }
            }
        }
        dbg(`TemplateStore: loaded ${templates.size} template(s) with ${this.loadDefects.length} defect(s).`);
        this.templates = templates;
        return templates;
    }

    private _loadConfig(): FullTemplatesConfig | undefined {
        if (!this.configFilePath) {
            return undefined;
        }
        try {
            const fileContent = this.readFileFn(this.configFilePath, 'utf-8');
            return TemplatesConfigSchema.parse(JSON.parse(fileContent));
        } catch (error: unknown) {
            this.loadDefects.push(`Failed to load or parse template configuration file: ${this.configFilePath}. Original error: ${errorMessage(error)}`);
            return undefined;
        }
    }

    private _resolvePath(templatePath: string): string {
        if (this.isAbsoluteFn(templatePath)) {
            return templatePath;
        }
        // Relative override paths are anchored at the config file's directory.
        if (this.configDir) {
            return this.resolvePathFn(this.configDir, templatePath);
        }
        return this.resolvePathFn(templatePath);
    }
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
