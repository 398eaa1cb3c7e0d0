import { Language, LanguageHint } from './dialogue_types';

const CYRILLIC = /[\u0400-\u04FF]/;

/**
 * Resolves the reply language. An explicit `ru`/`en` hint always wins, even over
 * text written in the other script; `auto` picks `ru` when the text holds any
 * Cyrillic character and `en` otherwise (including empty text).
 */
export function detectLanguage(text: string, hint: LanguageHint = 'auto'): Language {
    if (hint === 'ru' || hint === 'en') {
        return hint;
    }
    return CYRILLIC.test(text) ? 'ru' : 'en';
}

/**
 * Maps arbitrary user-supplied hint values onto a known hint. Only the exact
 * strings `ru` and `en` are overrides; anything else (`RU` included) is `auto`.
 */
export function normalizeLanguageHint(value: string | undefined | null): LanguageHint {
    if (value === 'ru' || value === 'en') {
        return value;
    }
    return 'auto';
}
