import inquirer from 'inquirer';
import { DialogueEntity } from '../entity/DialogueEntity';
import { LanguageHint } from '../dialogue/dialogue_types';
import { normalizeLanguageHint } from '../dialogue/languageDetector';
import { runTalk } from '../commands/talk';
import { runIAm, runWhoAmI } from '../commands/iAm';
import { dbg, say } from '../utils';

const EXIT_COMMAND = 'exit';
const I_AM_COMMAND = ':i-am';
const WHO_AM_I_COMMAND = ':who-am-i';
const LANGUAGE_COMMAND = ':lang';

export interface ShellSession {
    language: LanguageHint;
}

/**
 * Prompts the user for one line of input. Whitespace around it is trimmed.
 */
export async function getCommandInput(): Promise<string> {
    const answers = await inquirer.prompt<{ command: string }>([
        { type: 'input', name: 'command', message: 'entity> ' }
    ]);
    return answers.command.trim();
}

/**
 * Parses a command line input string into a command and arguments.
 *
 * Quoted arguments keep their spaces and lose their quotes:
 * `:lang "en"` becomes command ":lang", args ["en"].
 */
export function parseCommand(commandInput: string): { command: string, args: string[] } {
    const parts = commandInput.match(/(?:[^\s"']+|"[^"]*"|'[^']*')+/g) || [];
    const command = parts[0]?.toLowerCase() || '';
    const args = parts.slice(1).map((arg: string) =>
        (arg.startsWith('"') && arg.endsWith('"')) || (arg.startsWith("'") && arg.endsWith("'"))
        ? arg.slice(1, -1)
        : arg
    );
    return { command, args };
}

/**
 * Handles one line typed into the shell.
 * @returns `false` once the user asked to leave.
 */
export function handleShellInput(entity: DialogueEntity, session: ShellSession, commandInput: string): boolean {
    // Only a bare `exit` leaves; "Exit strategies?" is an ordinary turn
    if (commandInput.trim().toLowerCase() === EXIT_COMMAND) {
        say(`Leaving after ${entity.state.cycle} turn(s).`);
        return false;
    }

    const { command, args } = parseCommand(commandInput);
    switch (command) {
        case I_AM_COMMAND:
            runIAm(entity, { claims: args.includes('--claims') });
            return true;
        case WHO_AM_I_COMMAND:
            runWhoAmI(entity);
            return true;
        case LANGUAGE_COMMAND:
            session.language = normalizeLanguageHint(args[0]);
            say(`Reply language: ${session.language}`);
            return true;
        case '':
            return true;
        default:
            // Anything else is a dialogue turn, sent verbatim
            runTalk(entity, commandInput, session.language);
            return true;
    }
}

/**
 * Starts an interactive dialogue with one entity. Every line except the shell
 * commands counts as a dialogue turn; the cycle keeps growing until `exit`.
 */
export async function startShell(entity: DialogueEntity, language: LanguageHint = 'auto') {
    say('Starting interactive dialogue. Type "exit" to quit.');
    say(`Commands: ${I_AM_COMMAND} [--claims], ${WHO_AM_I_COMMAND}, ${LANGUAGE_COMMAND} <auto|ru|en>, ${EXIT_COMMAND}.`);

    const session: ShellSession = { language };
    let shellRunning = true;
    while (shellRunning) {
        const commandInput = await getCommandInput();
        dbg(`Shell input: "${commandInput}"`);
        shellRunning = handleShellInput(entity, session, commandInput);
    }
}
