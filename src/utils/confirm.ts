/**
 * Interactive confirmation for destructive AWS commands.
 *
 * The prompt goes to stderr and a single line is read from stdin through
 * inquirer. Only the affirmative token is accepted; there is no second chance.
 */

import inquirer from 'inquirer';
import type { DiagnosticLogger } from '../types';

export const AFFIRMATIVE_TOKEN = 'y';

/**
 * Prints `message` and resolves with the line the operator typed
 */
export type AskLine = (message: string) => Promise<string>;

export interface Confirmer {
    confirm(action: string): Promise<boolean>;
}

export const askWithInquirer: AskLine = async (message) => {
    const prompt = inquirer.createPromptModule({ output: process.stderr });
    const { answer } = await prompt<{ answer: string }>([
        {
            type: 'input',
            name: 'answer',
            message
        }
    ]);
    return answer;
};

export class PromptConfirmer implements Confirmer {
    constructor(
        private readonly logger: DiagnosticLogger,
        private readonly ask: AskLine = askWithInquirer
    ) {}

    async confirm(action: string): Promise<boolean> {
        const answer = await this.ask(`${action}\nConfirm [y/n]:`);
        const accepted = answer.trim() === AFFIRMATIVE_TOKEN;
        this.logger.debug('Confirmation answered', { action, accepted });
        return accepted;
    }
}
