import { TemplateStore } from '../dialogue/TemplateStore';
import { collectConfigurationDefects } from '../selfCheck';
import { say } from '../utils';

/**
 * Handles the 'self-check' command.
 * @returns `true` when no configuration defect was found.
 */
export function runSelfCheck(templatesConfig?: string, templates: TemplateStore = new TemplateStore(templatesConfig)): boolean {
    const defects = collectConfigurationDefects(templates);
    if (defects.length === 0) {
        say('Self-check passed: every response type has a template in every language, report contract holds.');
        return true;
    }
    say(`Self-check found ${defects.length} defect(s):`);
    for (const defect of defects) {
        say(`  - ${defect}`);
    }
    return false;
}
