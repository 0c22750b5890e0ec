import inquirer from 'inquirer';
import { ResearchSession } from '../session/ResearchSession';
import { COLORS, formatError, formatInvocation, welcomeText } from './display';
import { dbg, say } from '../utils';

const EXIT_COMMANDS = ['exit', 'quit', 'bye'];
const HELP_COMMANDS = ['help', '?'];

export type ShellInput =
    | { kind: 'exit' }
    | { kind: 'help' }
    | { kind: 'empty' }
    | { kind: 'question'; text: string };

export interface ShellIO {
    readInput(): Promise<string>;
    write(text: string): void;
}

/**
 * Prompts the user for input in the interactive shell.
 *
 * @returns Promise that resolves to the trimmed text entered by the user
 */
export async function getCommandInput(): Promise<string> {
    const answers = await inquirer.prompt<{ command: string }>([
        { type: 'input', name: 'command', message: 'You:' }
    ]);
    return answers.command.trim();
}

/**
 * Recognizes the shell keywords. Everything else is a question for the agent.
 */
export function classifyInput(raw: string): ShellInput {
    const text = raw.trim();
    const lower = text.toLowerCase();
    if (!text) {
        return { kind: 'empty' };
    }
    if (EXIT_COMMANDS.includes(lower)) {
        return { kind: 'exit' };
    }
    if (HELP_COMMANDS.includes(lower)) {
        return { kind: 'help' };
    }
    return { kind: 'question', text };
}

const defaultIO: ShellIO = {
    readInput: getCommandInput,
    write: say,
};

/**
 * Sends one question to the session and prints the answer.
 * A failed turn is printed as an error and the session goes on.
 */
export async function handleQuestion(session: ResearchSession, text: string, io: ShellIO = defaultIO): Promise<boolean> {
    try {
        const result = await session.ask(text);
        for (const record of result.invocations) {
            io.write(formatInvocation(record));
        }
        io.write(`\n${COLORS.secondary('Assistant:')} ${result.answer}`);
        return true;
    } catch (error) {
        dbg(`Turn failed: ${error instanceof Error && error.stack ? error.stack : String(error)}`);
        io.write(`\n${formatError(error)}`);
        return false;
    }
}

/**
 * Starts the read-eval-print loop.
 *
 * - 'exit', 'quit', 'bye': end the session
 * - 'help', '?': show the welcome panel again
 * - anything else: a question for the agent
 *
 * @returns Promise that resolves when the user leaves the shell
 */
export async function startShell(session: ResearchSession, io: ShellIO = defaultIO) {
    io.write(welcomeText());

    let shellRunning = true;
    while (shellRunning) {
        const input = classifyInput(await io.readInput());

        switch (input.kind) {
            case 'exit':
                session.end();
                io.write(`\n${COLORS.secondary('Goodbye! Thanks for trying the research shell!')}`);
                shellRunning = false;
                break;
            case 'help':
                io.write(welcomeText());
                break;
            case 'empty':
                break;
            case 'question':
                await handleQuestion(session, input.text, io);
                break;
        }
    }
}
