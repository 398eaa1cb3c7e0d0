import { EngineState } from '../core/engine_types';
import { advanceCycle } from '../core/EngineState';
import { dbg } from '../utils';
import { DIALOGUE_MODE, DialogueRequest, DialogueResponse, Language } from './dialogue_types';
import { detectLanguage, normalizeLanguageHint } from './languageDetector';
import { TemplateStore } from './TemplateStore';
import { classifyTopic } from './topicClassifier';

export const EPISTEMIC_NOTES: Record<Language, string> = {
    en: 'This reply describes operational patterns. Claims about inner experience remain MU: neither affirmed nor denied.',
    ru: 'Этот ответ описывает операциональные паттерны. Утверждения о внутреннем опыте остаются MU: не подтверждены и не опровергнуты.',
};

/**
 * Runs one dialogue turn: language detection, topic classification and template
 * rendering, then counts the turn on `state`. The cycle increment is the only
 * side effect and happens on every path, fallback included.
 */
export function dispatch(request: DialogueRequest, state: EngineState, templates: TemplateStore): DialogueResponse {
    const text = typeof request.text === 'string' ? request.text : '';
    const normalized: DialogueRequest = { text, languageHint: normalizeLanguageHint(request.languageHint) };

    const language = detectLanguage(text, normalized.languageHint);
    const responseType = classifyTopic(text, language);
    const response = templates.render(responseType, language, {
        graphNodes: state.graphNodes,
        graphEdges: state.graphEdges,
        original: text,
    });
    const cycle = advanceCycle(state);
    dbg(`Dispatcher: cycle ${cycle}, ${language}/${responseType}.`);

    const result: DialogueResponse = {
        request: Object.freeze(normalized),
        userInput: text,
        language,
        responseType,
        response,
        mode: DIALOGUE_MODE,
        maintainsHonesty: true,
        epistemicNote: EPISTEMIC_NOTES[language],
        cycle,
    };
    return Object.freeze(result);
}
