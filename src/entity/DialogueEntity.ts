import { EngineState } from '../core/engine_types';
import { createEngineState } from '../core/EngineState';
import { DialogueResponse } from '../dialogue/dialogue_types';
import { dispatch } from '../dialogue/dispatcher';
import { normalizeLanguageHint } from '../dialogue/languageDetector';
import { TemplateStore } from '../dialogue/TemplateStore';
import { reportPresence } from '../epistemic/EpistemicReporter';
import { EpistemicReport } from '../epistemic/epistemic_types';
import { IdentityReport, reportIdentity } from '../epistemic/identityReport';
import { assertConfiguration } from '../selfCheck';
import { dbg, newEntityId } from '../utils';

/**
 * One speaking entity: its own state, its templates, and the two entry points
 * `talkSimply` and `iAm`. Instances share nothing, so several can run side by side.
 */
export class DialogueEntity {
    readonly id: string;
    readonly state: EngineState;
    private readonly templates: TemplateStore;

    /**
     * @throws ConfigurationError if the templates or report contract are inconsistent.
     */
    constructor(templates: TemplateStore = new TemplateStore(), state: EngineState = createEngineState(), id: string = newEntityId()) {
        assertConfiguration(templates);
        this.templates = templates;
        this.state = state;
        this.id = id;
        dbg(`DialogueEntity ${this.id} ready at cycle ${this.state.cycle}.`);
    }

    /**
     * Answers one line of user text. `language` may be "auto", "ru" or "en";
     * anything else is treated as "auto".
     */
    talkSimply(userInput: string, language: string = 'auto'): DialogueResponse {
        return dispatch({ text: userInput, languageHint: normalizeLanguageHint(language) }, this.state, this.templates);
    }

    iAm(): EpistemicReport {
        return reportPresence(this.state);
    }

    whoAmI(): IdentityReport {
        return reportIdentity(this.state);
    }
}
