// src/cli/prompt.ts

import readline from 'node:readline';

export type InterruptReason = 'sigint' | 'closed';

/**
 * The pending question was abandoned: Ctrl+C, or input ended
 */
export class PromptInterruptedError extends Error {
    constructor(public readonly reason: InterruptReason) {
        super(reason === 'sigint' ? 'Input interrupted' : 'Input closed');
        this.name = 'PromptInterruptedError';
    }
}

export function isPromptInterrupted(error: unknown): error is PromptInterruptedError {
    return error instanceof PromptInterruptedError;
}

/**
 * Line-oriented question/answer source for the menus
 */
export interface Prompt {
    ask(question: string): Promise<string>;
    close(): void;
}

/**
 * Sink for menu and table lines
 */
export type Output = (line: string) => void;

export const consoleOutput: Output = line => console.log(line);

/**
 * Prompt over a terminal (stdin/stdout by default)
 *
 * Lines are queued as they arrive, so piped or pasted input is answered in
 * order even when several lines land before the next question. SIGINT
 * rejects the pending question with PromptInterruptedError; once input has
 * ended, asks keep draining the queue and reject when it is empty.
 */
export class ReadlinePrompt implements Prompt {
    private readonly rl: readline.Interface;
    private readonly lines: string[] = [];
    private waiting: { resolve: (line: string) => void; reject: (error: Error) => void } | null = null;
    private closed = false;

    constructor(
        input: NodeJS.ReadableStream = process.stdin,
        output: NodeJS.WritableStream = process.stdout
    ) {
        this.rl = readline.createInterface({ input, output });
        this.rl.on('line', line => this.receive(line));
        this.rl.on('SIGINT', () => this.interrupt('sigint'));
        this.rl.on('close', () => {
            this.closed = true;
            this.interrupt('closed');
        });
    }

    ask(question: string): Promise<string> {
        if (!this.closed) {
            this.rl.setPrompt(question);
            this.rl.prompt();
        }

        const queued = this.lines.shift();
        if (queued !== undefined) {
            return Promise.resolve(queued);
        }
        if (this.closed) {
            return Promise.reject(new PromptInterruptedError('closed'));
        }

        return new Promise((resolve, reject) => {
            this.waiting = { resolve, reject };
        });
    }

    close(): void {
        if (!this.closed) {
            this.rl.close();
        }
    }

    private receive(line: string): void {
        const waiting = this.waiting;
        if (waiting) {
            this.waiting = null;
            waiting.resolve(line);
            return;
        }
        this.lines.push(line);
    }

    private interrupt(reason: InterruptReason): void {
        const waiting = this.waiting;
        if (!waiting) {
            return;
        }

        this.waiting = null;
        waiting.reject(new PromptInterruptedError(reason));
    }
}
