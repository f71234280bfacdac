// src/model.ts
// Обёртка над OpenAI-совместимым API (по умолчанию OpenRouter)
import OpenAI, { type ClientOptions } from "openai";
import type { Config } from "./config";
import { NetworkError, ProtocolError } from "./errors";
import type { Logger } from "./logger";
import type { RawToolCall } from "./tools";

export type ChatMessage = OpenAI.ChatCompletionMessageParam;

export interface ModelReply {
    content: string | null;
    toolCalls: RawToolCall[];
}

export interface ChatModel {
    complete(messages: readonly ChatMessage[], tools: OpenAI.ChatCompletionTool[]): Promise<ModelReply>;
}

export class OpenAIChatModel implements ChatModel {
    private readonly client: OpenAI;
    private readonly name: string;
    private readonly logger: Logger;

    constructor(config: Config["model"], logger: Logger, clientOptions: Pick<ClientOptions, "fetch"> = {}) {
        this.client = new OpenAI({
            ...clientOptions,
            baseURL: config.baseURL,
            apiKey: config.apiKey,
            maxRetries: 0,
        });
        this.name = config.name;
        this.logger = logger.child({ module: "model" });
    }

    async complete(messages: readonly ChatMessage[], tools: OpenAI.ChatCompletionTool[]): Promise<ModelReply> {
        this.logger.debug({ model: this.name, messages }, "Отправляем запрос модели");

        let response: OpenAI.ChatCompletion;
        try {
            response = await this.client.chat.completions.create({
                model: this.name,
                messages: [...messages],
                tools,
            });
        } catch (e) {
            if (e instanceof OpenAI.APIError) {
                throw new NetworkError(`Модель: ${e.message}`, { status: e.status, cause: e });
            }
            throw e;
        }

        const choice = response.choices[0];
        if (!choice) {
            throw new ProtocolError("Модель вернула ответ без choices");
        }

        const { message } = choice;
        return {
            content: message.content,
            toolCalls: message.tool_calls ?? [],
        };
    }
}
