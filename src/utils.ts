import * as uuid from 'uuid';

let debugEnabled = false;

export function setDebug(enabled: boolean) {
    debugEnabled = enabled;
}

export function dbg(s: string) {
    if (debugEnabled) {
        console.debug(s);
    }
}

export function say(s: string) {
    console.log(s);
}

export function newEntityId(): string {
    return uuid.v4();
}

/**
 * Error raised when the shipped templates, rule table or report contract are
 * inconsistent. Only ever thrown while an entity is being set up.
 */
export class ConfigurationError extends Error {
    readonly defects: string[];

    constructor(defects: string[]) {
        super(`Configuration defects found:\n - ${defects.join('\n - ')}`);
        this.name = 'ConfigurationError';
        this.defects = defects;
    }
}
