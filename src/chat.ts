// src/chat.ts
// Чат-цикл: ввод → модель → (tool call → tool → модель)* → вывод
import type OpenAI from "openai";
import { ProtocolError } from "./errors";
import type { Logger } from "./logger";
import type { ChatModel } from "./model";
import type { Prompt } from "./prompt";
import {
    TOOL_DECLARATIONS,
    executeToolCall,
    parseToolCall,
    toOpenAITools,
    type ToolClients,
} from "./tools";
import { Transcript } from "./transcript";

export const EXIT_COMMAND = "exit";

export const SYSTEM_PROMPT =
    "Отвечай одним предложением или вызовом tool. " +
    `Пользователь отправляет \`${EXIT_COMMAND}\`, чтобы завершить диалог.`;

export const GREETING =
    "Привет! Я подскажу погоду и текущее время в любом городе. " +
    `Напиши \`${EXIT_COMMAND}\`, чтобы выйти.`;

export const DEFAULT_MAX_TOOL_ROUNDS = 10;

export interface ChatSessionOptions {
    model: ChatModel;
    tools: ToolClients;
    prompt: Prompt;
    logger: Logger;
    print?: (text: string) => void;
    maxToolRounds?: number;
}

// Пользователь может скопировать строку вместе с приглашением "> "
export function normalizeInput(line: string): string {
    return line.trim().replace(/^>+/, "").trim();
}

export class ChatSession {
    readonly transcript = new Transcript(SYSTEM_PROMPT);

    private readonly model: ChatModel;
    private readonly tools: ToolClients;
    private readonly prompt: Prompt;
    private readonly logger: Logger;
    private readonly print: (text: string) => void;
    private readonly maxToolRounds: number;
    private readonly openAITools: OpenAI.ChatCompletionTool[];

    constructor(options: ChatSessionOptions) {
        this.model = options.model;
        this.tools = options.tools;
        this.prompt = options.prompt;
        this.logger = options.logger.child({ module: "chat" });
        this.print = options.print ?? ((text) => console.log(text));
        this.maxToolRounds = options.maxToolRounds ?? DEFAULT_MAX_TOOL_ROUNDS;
        this.openAITools = toOpenAITools(TOOL_DECLARATIONS);
    }

    /** Крутит диалог, пока пользователь не напишет `exit` или не закроет stdin. */
    async run(): Promise<void> {
        this.print(GREETING);

        while (true) {
            const line = await this.prompt.ask("> ");
            if (line === null) {
                this.logger.info("stdin закрыт, завершаем");
                return;
            }

            const request = normalizeInput(line);
            if (request === EXIT_COMMAND) {
                this.logger.info("Пользователь завершил диалог");
                return;
            }
            if (request === "") continue;

            this.logger.info({ role: "user" }, request);
            this.transcript.appendUser(request);

            const answer = await this.respond();
            this.print(answer);

            // Модель тоже может закончить разговор
            if (answer === EXIT_COMMAND) return;
        }
    }

    /**
     * Один ход пользователя: гоняем модель, пока она просит tools,
     * и возвращаем её финальный текст. Любая ошибка фатальна.
     */
    async respond(): Promise<string> {
        let rounds = 0;

        while (true) {
            const reply = await this.model.complete(this.transcript.messages, this.openAITools);

            if (reply.toolCalls.length === 0) {
                const text = reply.content?.trim() ?? "";
                if (text === "") {
                    throw new ProtocolError("Модель вернула пустой ответ");
                }
                this.transcript.appendAssistantText(text);
                this.logger.info({ role: "assistant" }, text);
                return text;
            }

            if (rounds >= this.maxToolRounds) {
                throw new ProtocolError(`Достигнут лимит вызовов tools: ${this.maxToolRounds}`);
            }
            rounds++;

            // Сначала проверяем все вызовы: необъявленный tool не должен дойти ни до одного клиента
            const calls = reply.toolCalls.map(parseToolCall);
            this.transcript.appendToolCalls(reply.content, reply.toolCalls);

            // Строго по очереди: не больше одного запроса в полёте
            for (const call of calls) {
                this.logger.info({ tool: call.name, args: call.args }, "Tool call");
                const result = await executeToolCall(call, this.tools);
                this.logger.debug({ tool: result.name, payload: result.payload }, "Tool result");
                this.transcript.appendToolResult(result);
            }
        }
    }
}
