import { DialogueEntity } from '../entity/DialogueEntity';
import { formatDialogueResponse } from '../cli/format';
import { DialogueResponse } from '../dialogue/dialogue_types';
import { say } from '../utils';

export interface TalkOptions {
    json?: boolean;
}

/**
 * Handles the 'talk' command: one dialogue turn, printed as text or JSON.
 */
export function runTalk(entity: DialogueEntity, inputText: string, language: string, options: TalkOptions = {}): DialogueResponse {
    const response = entity.talkSimply(inputText, language);
    say(options.json ? JSON.stringify(response, null, 2) : formatDialogueResponse(response));
    return response;
}
