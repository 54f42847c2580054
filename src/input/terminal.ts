import { createInterface, type Interface } from 'readline';
import type { PromptIO } from './prompt.js';
import { InputClosedError } from './errors.js';

interface PendingAnswer {
    resolve: (line: string) => void;
    reject: (err: Error) => void;
}

/**
 * Prompt I/O over a line stream. Lines that arrive before a question is
 * asked (piped input) are queued and answer later questions in order.
 */
export class TerminalPrompt implements PromptIO {
    private rl: Interface;
    private closed = false;
    private queued: string[] = [];
    private pending: PendingAnswer[] = [];

    constructor(
        input: NodeJS.ReadableStream = process.stdin,
        private output: NodeJS.WritableStream = process.stdout,
    ) {
        this.rl = createInterface({ input, output });

        this.rl.on('line', (line) => {
            const waiter = this.pending.shift();
            if (waiter) {
                waiter.resolve(line);
            } else {
                this.queued.push(line);
            }
        });

        this.rl.once('close', () => {
            this.closed = true;
            const waiters = this.pending;
            this.pending = [];
            waiters.forEach((waiter) => waiter.reject(new InputClosedError()));
        });
    }

    async ask(question: string): Promise<string> {
        if (this.closed) {
            this.output.write(question);
        } else {
            this.rl.setPrompt(question);
            this.rl.prompt();
        }

        const next = this.queued.shift();
        if (next !== undefined) {
            return next;
        }
        if (this.closed) {
            throw new InputClosedError();
        }

        return new Promise((resolve, reject) => {
            this.pending.push({ resolve, reject });
        });
    }

    say(line: string): void {
        this.output.write(`${line}\n`);
    }

    close(): void {
        if (!this.closed) {
            this.rl.close();
        }
    }
}
