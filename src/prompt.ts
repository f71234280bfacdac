// src/prompt.ts
// Построчный ввод из терминала
import * as readline from "readline";

export interface Prompt {
    // null — stdin закрыт (Ctrl+D или конец пайпа)
    ask(question: string): Promise<string | null>;
    close(): void;
}

export function createTerminalPrompt(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout,
): Prompt {
    const rl = readline.createInterface({ input, output });
    // Один итератор на всю жизнь prompt: строки, пришедшие пока идёт запрос к модели, ждут в очереди
    const lines = rl[Symbol.asyncIterator]();
    let closed = false;
    rl.on("close", () => {
        closed = true;
    });

    return {
        async ask(question) {
            if (!closed) {
                rl.setPrompt(question);
                rl.prompt();
            }
            const next = await lines.next();
            return next.done ? null : next.value;
        },
        close() {
            if (!closed) rl.close();
        },
    };
}
